import type { FastifyInstance } from 'fastify';
import type { DbExecutor, TaskId } from '@tasklane/core';
import {
  countTasks,
  createTask,
  getTaskById,
  listTasks,
  softDeleteTask,
  updateTask,
  validateListQuery,
} from '@tasklane/core';
import { toTaskResponse } from '../serializers.js';
import { sendInvalid, sendTaskNotFound } from '../errors.js';

interface TaskParams {
  id: string;
}

const TASK_ID_RE = /^\d+$/;

/** Path ids that are not positive integers can never name a task */
export function parseTaskId(raw: string): TaskId | null {
  if (!TASK_ID_RE.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function registerTaskRoutes(app: FastifyInstance, db: DbExecutor): void {
  app.post('/tasks', async (req, reply) => {
    const result = createTask(db, req.body);
    if (result.type === 'invalid') return sendInvalid(reply, result.details);

    req.log.info({ taskId: result.data.id }, 'task created');
    return reply.code(201).send(toTaskResponse(result.data));
  });

  app.get('/tasks', async (req, reply) => {
    const query = validateListQuery(req.query);
    if (query.type === 'invalid') return sendInvalid(reply, query.details);

    const page = listTasks(db, query.value);
    const total = countTasks(db, query.value);
    return reply.header('X-Total-Count', String(total)).send(page.map(toTaskResponse));
  });

  app.get<{ Params: TaskParams }>('/tasks/:id', async (req, reply) => {
    const taskId = parseTaskId(req.params.id);
    const task = taskId === null ? null : getTaskById(db, taskId);
    if (!task) return sendTaskNotFound(reply);
    return reply.send(toTaskResponse(task));
  });

  app.patch<{ Params: TaskParams }>('/tasks/:id', async (req, reply) => {
    const taskId = parseTaskId(req.params.id);
    if (taskId === null) return sendTaskNotFound(reply);

    const result = updateTask(db, taskId, req.body);
    switch (result.type) {
      case 'invalid': return sendInvalid(reply, result.details);
      case 'not-found': return sendTaskNotFound(reply);
      case 'success':
        req.log.info({ taskId }, 'task updated');
        return reply.send(toTaskResponse(result.data));
    }
  });

  app.delete<{ Params: TaskParams }>('/tasks/:id', async (req, reply) => {
    const taskId = parseTaskId(req.params.id);
    if (taskId === null) return sendTaskNotFound(reply);

    const result = softDeleteTask(db, taskId);
    if (result.type !== 'success') return sendTaskNotFound(reply);

    req.log.info({ taskId }, 'task deleted');
    return reply.send({ detail: 'Task deleted successfully' });
  });
}
