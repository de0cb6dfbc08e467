export { tasks } from './tasks.js';
export { tags } from './tags.js';
export { taskTags } from './task-tags.js';
