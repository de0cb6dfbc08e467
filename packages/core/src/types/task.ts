import type { Priority } from './priority.js';
import type { TaskVisibility } from './task-visibility.js';

export type TaskId = number;
export type TagId = number;

export interface Tag {
  readonly id: TagId;
  readonly name: string;
}

/** Fully materialized task: tags are always resolved, never lazy */
export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly priority: Priority;
  readonly dueDate: string; // yyyy-MM-dd
  readonly completed: boolean;
  readonly visibility: TaskVisibility;
  readonly tags: readonly Tag[];
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
}

/** Filters and paging accepted by the list query */
export interface TaskListQuery {
  readonly skip?: number;
  readonly limit?: number;
  readonly completed?: boolean;
  readonly priority?: Priority;
  /** Comma-separated tag names; a task must carry every one */
  readonly tags?: string;
}
