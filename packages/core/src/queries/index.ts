// Task repository
export {
  getTaskById,
  listTasks,
  countTasks,
  createTask,
  updateTask,
  softDeleteTask,
} from './task-queries.js';

// Tag reconciler
export {
  getTagByName,
  getAllTags,
  insertTagOrReuse,
  reconcileTags,
} from './tag-queries.js';
