/**
 * Soft-delete state. `deleted` is terminal: no operation moves a task back
 * to `active`.
 */
export const TaskVisibility = {
  Active: 'active',
  Deleted: 'deleted',
} as const;

export type TaskVisibility = (typeof TaskVisibility)[keyof typeof TaskVisibility];

export const TASK_VISIBILITIES = [TaskVisibility.Active, TaskVisibility.Deleted] as const;
