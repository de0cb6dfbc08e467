import { sqliteTable, integer, primaryKey, index } from 'drizzle-orm/sqlite-core';
import { tasks } from './tasks.js';
import { tags } from './tags.js';

/** Pure join table: rows only change as a side effect of a task's tag list */
export const taskTags = sqliteTable('task_tags', {
  taskId: integer('task_id').notNull().references(() => tasks.id, { onDelete: 'cascade' }),
  tagId: integer('tag_id').notNull().references(() => tags.id, { onDelete: 'cascade' }),
}, (table) => [
  primaryKey({ columns: [table.taskId, table.tagId] }),
  index('idx_task_tags_tag_id').on(table.tagId),
]);
