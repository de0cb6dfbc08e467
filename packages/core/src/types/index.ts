export { Priority, PriorityName, PRIORITY_MIN, PRIORITY_MAX, isPriority } from './priority.js';
export { TaskVisibility, TASK_VISIBILITIES } from './task-visibility.js';
export type { TaskId, TagId, Tag, Task, TaskListQuery } from './task.js';
export type { DataResult, CreateResult, ValidationResult, ValidationDetails } from './results.js';
export { isSuccess, isNotFound } from './results.js';
