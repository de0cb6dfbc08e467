import { sqliteTable, text, integer, index, check } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import type { Priority } from '../types/priority.js';
import { TASK_VISIBILITIES, TaskVisibility } from '../types/task-visibility.js';

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  description: text('description'),
  priority: integer('priority').$type<Priority>().notNull(),
  /** yyyy-MM-dd */
  dueDate: text('due_date').notNull(),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  /** Soft-delete marker; `deleted` rows stay in the table */
  visibility: text('visibility', { enum: TASK_VISIBILITIES }).notNull().default(TaskVisibility.Active),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => [
  index('idx_tasks_visibility').on(table.visibility),
  index('idx_tasks_completed').on(table.completed),
  index('idx_tasks_priority').on(table.priority),
  check('priority_range', sql`${table.priority} BETWEEN 1 AND 5`),
]);
