import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createTestDb, createLogger, getRawDb, type AppDb } from '@tasklane/core';
import { buildApp, type TaskResponse } from '../src/app.js';

const FAR = '2999-01-01';

let db: AppDb;
let app: FastifyInstance;

beforeEach(() => {
  db = createTestDb();
  app = buildApp({ db, logger: createLogger({ level: 'silent' }) });
});

afterEach(async () => {
  await app.close();
});

async function createVia(payload: Record<string, unknown>): Promise<TaskResponse> {
  const res = await app.inject({
    method: 'POST',
    url: '/tasks',
    payload: { title: 'Task', priority: 3, due_date: FAR, ...payload },
  });
  expect(res.statusCode).toBe(201);
  return res.json<TaskResponse>();
}

describe('POST /tasks', () => {
  it('creates a task and returns 201', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/tasks',
      payload: { title: 'Write spec', priority: 3, due_date: FAR, tags: ['docs', 'urgent'] },
    });

    expect(res.statusCode).toBe(201);
    const body = res.json<TaskResponse>();
    expect(body).toMatchObject({
      title: 'Write spec',
      description: null,
      priority: 3,
      due_date: FAR,
      completed: false,
    });
    expect(body.tags.map(t => t.name)).toEqual(['docs', 'urgent']);
    expect(body).not.toHaveProperty('visibility');
    expect(typeof body.created_at).toBe('string');
  });

  it('returns 422 with every failing field', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/tasks',
      payload: { title: '', priority: 9, due_date: '2000-01-01' },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      error: 'Validation Failed',
      details: {
        title: 'Title must not be empty',
        priority: 'Priority must be between 1 and 5',
        due_date: 'Due date cannot be in the past',
      },
    });
  });

  it('reports a malformed JSON body as a validation failure', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/tasks',
      headers: { 'content-type': 'application/json' },
      payload: '{"title": ',
    });

    expect(res.statusCode).toBe(422);
    const body = res.json<{ error: string; details: Record<string, string> }>();
    expect(body.error).toBe('Validation Failed');
    expect(Object.keys(body.details)).toEqual(['body']);
  });

  it('rejects a missing body', async () => {
    const res = await app.inject({ method: 'POST', url: '/tasks' });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ error: 'Validation Failed', details: { body: 'Request body is required' } });
  });
});

describe('GET /tasks', () => {
  it('lists active tasks with a total count header', async () => {
    const first = await createVia({ title: 'one' });
    const second = await createVia({ title: 'two' });

    const res = await app.inject({ method: 'GET', url: '/tasks' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['x-total-count']).toBe('2');
    expect(res.json<TaskResponse[]>().map(t => t.id)).toEqual([first.id, second.id]);
  });

  it('pages with skip and limit', async () => {
    const created: TaskResponse[] = [];
    for (let i = 0; i < 4; i++) created.push(await createVia({ title: `t${i}` }));

    const res = await app.inject({ method: 'GET', url: '/tasks?skip=1&limit=2' });

    expect(res.json<TaskResponse[]>().map(t => t.id)).toEqual([created[1]?.id, created[2]?.id]);
    expect(res.headers['x-total-count']).toBe('4');
  });

  it('filters by tags with AND semantics', async () => {
    const both = await createVia({ tags: ['a', 'b'] });
    await createVia({ tags: ['a'] });

    const res = await app.inject({ method: 'GET', url: '/tasks?tags=a,b' });

    expect(res.json<TaskResponse[]>().map(t => t.id)).toEqual([both.id]);
    expect(res.headers['x-total-count']).toBe('1');
  });

  it('filters by priority and completion', async () => {
    const target = await createVia({ priority: 5, completed: true });
    await createVia({ priority: 5 });
    await createVia({ priority: 1, completed: true });

    const res = await app.inject({ method: 'GET', url: '/tasks?priority=5&completed=true' });

    expect(res.json<TaskResponse[]>().map(t => t.id)).toEqual([target.id]);
  });

  it('rejects bad query parameters', async () => {
    const res = await app.inject({ method: 'GET', url: '/tasks?limit=0&priority=7' });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      error: 'Validation Failed',
      details: { limit: 'Limit must be at least 1', priority: 'Priority must be between 1 and 5' },
    });
  });
});

describe('GET /tasks/:id', () => {
  it('returns the task', async () => {
    const created = await createVia({ tags: ['docs'] });
    const res = await app.inject({ method: 'GET', url: `/tasks/${created.id}` });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(created);
  });

  it('returns 404 for unknown and non-numeric ids', async () => {
    for (const id of ['999', 'abc', '0', '-1']) {
      const res = await app.inject({ method: 'GET', url: `/tasks/${id}` });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ detail: 'Task not found' });
    }
  });
});

describe('PATCH /tasks/:id', () => {
  it('updates only the fields sent', async () => {
    const created = await createVia({ title: 'Old', tags: ['docs'], priority: 2 });

    const res = await app.inject({ method: 'PATCH', url: `/tasks/${created.id}`, payload: { title: 'New' } });

    expect(res.statusCode).toBe(200);
    const body = res.json<TaskResponse>();
    expect(body.title).toBe('New');
    expect(body.priority).toBe(2);
    expect(body.tags.map(t => t.name)).toEqual(['docs']);
  });

  it('clears tags with an empty list', async () => {
    const created = await createVia({ tags: ['docs'] });
    const res = await app.inject({ method: 'PATCH', url: `/tasks/${created.id}`, payload: { tags: [] } });
    expect(res.json<TaskResponse>().tags).toEqual([]);
  });

  it('returns 422 for invalid fields', async () => {
    const created = await createVia({});
    const res = await app.inject({ method: 'PATCH', url: `/tasks/${created.id}`, payload: { priority: 0 } });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ error: 'Validation Failed', details: { priority: 'Priority must be between 1 and 5' } });
  });

  it('returns 404 for an unknown task', async () => {
    const res = await app.inject({ method: 'PATCH', url: '/tasks/999', payload: { title: 'x' } });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ detail: 'Task not found' });
  });
});

describe('DELETE /tasks/:id', () => {
  it('soft-deletes and hides the task', async () => {
    const created = await createVia({ tags: ['docs'] });

    const res = await app.inject({ method: 'DELETE', url: `/tasks/${created.id}` });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ detail: 'Task deleted successfully' });

    expect((await app.inject({ method: 'GET', url: `/tasks/${created.id}` })).statusCode).toBe(404);
    expect((await app.inject({ method: 'GET', url: '/tasks' })).json()).toEqual([]);
    expect(getRawDb(db).prepare('SELECT visibility FROM tasks WHERE id = ?').get(created.id))
      .toEqual({ visibility: 'deleted' });
  });

  it('returns 404 on a second delete', async () => {
    const created = await createVia({});
    await app.inject({ method: 'DELETE', url: `/tasks/${created.id}` });
    const res = await app.inject({ method: 'DELETE', url: `/tasks/${created.id}` });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ detail: 'Task not found' });
  });
});

describe('errors', () => {
  it('hides storage failures behind a 500', async () => {
    getRawDb(db).exec('DROP TABLE task_tags; DROP TABLE tasks;');
    const res = await app.inject({ method: 'GET', url: '/tasks' });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'Internal Server Error' });
  });

  it('answers unknown routes with 404', async () => {
    const res = await app.inject({ method: 'GET', url: '/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ detail: 'Not Found' });
  });
});

describe('GET /health', () => {
  it('reports ok', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.json()).toEqual({ status: 'ok' });
  });
});
