/**
 * Task repository: create, read, list, partial update and soft delete.
 *
 * Every function takes the database handle explicitly. Writes run inside a
 * single transaction so a task row and its tag links change together.
 * Deleted tasks are invisible to every operation here.
 */

import { and, asc, count, eq, inArray, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import type { Tag, Task, TaskId, TaskListQuery } from '../types/task.js';
import type { CreateResult, DataResult } from '../types/results.js';
import { TaskVisibility } from '../types/task-visibility.js';
import { tasks } from '../schema/tasks.js';
import { tags } from '../schema/tags.js';
import { taskTags } from '../schema/task-tags.js';
import { withStorage } from '../errors.js';
import { todayString } from '../parsers/date-parser.js';
import { parseTagList } from '../parsers/tag-filter-parser.js';
import { validateTaskCreate, validateTaskUpdate } from '../validation/task-validator.js';
import { DEFAULT_LIMIT, DEFAULT_SKIP } from '../validation/list-query.js';
import { reconcileTags } from './tag-queries.js';

type TaskRow = typeof tasks.$inferSelect;

// ---------------------------------------------------------------------------
// Materialization
// ---------------------------------------------------------------------------

/** Load the tags of many tasks in one query, in link order */
function loadTagsFor(db: DbExecutor, taskIds: readonly TaskId[]): Map<TaskId, Tag[]> {
  const byTask = new Map<TaskId, Tag[]>();
  if (taskIds.length === 0) return byTask;

  const rows = db
    .select({ taskId: taskTags.taskId, id: tags.id, name: tags.name })
    .from(taskTags)
    .innerJoin(tags, eq(tags.id, taskTags.tagId))
    .where(inArray(taskTags.taskId, [...taskIds]))
    .orderBy(sql`${taskTags}.rowid`)
    .all();

  for (const row of rows) {
    const list = byTask.get(row.taskId) ?? [];
    list.push({ id: row.id, name: row.name });
    byTask.set(row.taskId, list);
  }
  return byTask;
}

function toTask(row: TaskRow, taskTagList: readonly Tag[]): Task {
  return { ...row, tags: taskTagList };
}

function materialize(db: DbExecutor, rows: readonly TaskRow[]): Task[] {
  const tagsByTask = loadTagsFor(db, rows.map(r => r.id));
  return rows.map(row => toTask(row, tagsByTask.get(row.id) ?? []));
}

function linkTags(db: DbExecutor, taskId: TaskId, taskTagList: readonly Tag[]): void {
  if (taskTagList.length === 0) return;
  db.insert(taskTags).values(taskTagList.map(tag => ({ taskId, tagId: tag.id }))).run();
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

const isActive = eq(tasks.visibility, TaskVisibility.Active);

function findActiveRow(db: DbExecutor, taskId: TaskId): TaskRow | undefined {
  return db.select().from(tasks).where(and(eq(tasks.id, taskId), isActive)).get();
}

/** Get a single active task by ID; deleted and missing both yield null */
export function getTaskById(db: DbExecutor, taskId: TaskId): Task | null {
  return withStorage('get task', () => {
    const row = findActiveRow(db, taskId);
    if (!row) return null;
    return materialize(db, [row])[0] ?? null;
  });
}

/**
 * WHERE clause shared by list and count. Tag filtering is AND across names:
 * a task qualifies only when it links to every requested tag.
 */
function listConditions(db: DbExecutor, query: TaskListQuery): SQL | undefined {
  const conditions: SQL[] = [isActive];

  if (query.completed !== undefined) {
    conditions.push(eq(tasks.completed, query.completed));
  }
  if (query.priority !== undefined) {
    conditions.push(eq(tasks.priority, query.priority));
  }

  const tagNames = parseTagList(query.tags);
  if (tagNames.length > 0) {
    const carriesAll = db
      .select({ taskId: taskTags.taskId })
      .from(taskTags)
      .innerJoin(tags, eq(tags.id, taskTags.tagId))
      .where(inArray(tags.name, tagNames))
      .groupBy(taskTags.taskId)
      .having(sql`count(distinct ${tags.id}) = ${tagNames.length}`);
    conditions.push(inArray(tasks.id, carriesAll));
  }

  return and(...conditions);
}

/** Active tasks matching the filters, ascending by id, one page at a time */
export function listTasks(db: DbExecutor, query: TaskListQuery = {}): Task[] {
  const skip = Math.max(0, query.skip ?? DEFAULT_SKIP);
  const limit = Math.max(0, query.limit ?? DEFAULT_LIMIT);

  return withStorage('list tasks', () => {
    const rows = db.select().from(tasks)
      .where(listConditions(db, query))
      .orderBy(asc(tasks.id))
      .limit(limit)
      .offset(skip)
      .all();
    return materialize(db, rows);
  });
}

/** Number of active tasks matching the filters, ignoring paging */
export function countTasks(db: DbExecutor, query: TaskListQuery = {}): number {
  return withStorage('count tasks', () => {
    const row = db.select({ total: count() }).from(tasks).where(listConditions(db, query)).get();
    return row?.total ?? 0;
  });
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Validate and persist a new task with its tags */
export function createTask(db: DbExecutor, payload: unknown, today: string = todayString()): CreateResult<Task> {
  const validation = validateTaskCreate(payload, today);
  if (validation.type === 'invalid') return validation;

  const input = validation.value;
  const task = withStorage('create task', () => db.transaction((tx) => {
    const resolved = reconcileTags(tx, input.tags);
    const now = new Date().toISOString();

    const row = tx.insert(tasks).values({
      title: input.title,
      description: input.description,
      priority: input.priority,
      dueDate: input.dueDate,
      completed: input.completed,
      visibility: TaskVisibility.Active,
      createdAt: now,
      updatedAt: now,
    }).returning().get();

    linkTags(tx, row.id, resolved);
    return toTask(row, resolved);
  }, { behavior: 'immediate' }));

  return { type: 'success', data: task };
}

/**
 * Apply the fields present in `payload`. A present `tags` list (even empty)
 * replaces the task's whole tag set; an absent one leaves it alone.
 * Validation runs before anything is read or written.
 */
export function updateTask(
  db: DbExecutor,
  taskId: TaskId,
  payload: unknown,
  today: string = todayString(),
): DataResult<Task> {
  const validation = validateTaskUpdate(payload, today);
  if (validation.type === 'invalid') return validation;

  const patch = validation.value;
  const task = withStorage('update task', () => db.transaction((tx) => {
    if (!findActiveRow(tx, taskId)) return null;

    const { tags: tagNames, ...fields } = patch;
    tx.update(tasks)
      .set({ ...fields, updatedAt: new Date().toISOString() })
      .where(and(eq(tasks.id, taskId), isActive))
      .run();

    if (tagNames !== undefined) {
      tx.delete(taskTags).where(eq(taskTags.taskId, taskId)).run();
      linkTags(tx, taskId, reconcileTags(tx, tagNames));
    }

    return getTaskById(tx, taskId);
  }, { behavior: 'immediate' }));

  return task ? { type: 'success', data: task } : { type: 'not-found', taskId };
}

/**
 * Flip an active task to deleted. The row and its tag links stay in storage.
 * A second call for the same id reports not-found.
 */
export function softDeleteTask(db: DbExecutor, taskId: TaskId): DataResult<Task> {
  const task = withStorage('delete task', () => db.transaction((tx) => {
    const existing = getTaskById(tx, taskId);
    if (!existing) return null;

    const updatedAt = new Date().toISOString();
    tx.update(tasks)
      .set({ visibility: TaskVisibility.Deleted, updatedAt })
      .where(and(eq(tasks.id, taskId), isActive))
      .run();

    return { ...existing, visibility: TaskVisibility.Deleted, updatedAt };
  }, { behavior: 'immediate' }));

  return task ? { type: 'success', data: task } : { type: 'not-found', taskId };
}
