export {
  validateTaskCreate,
  validateTaskUpdate,
  taskCreateSchema,
  taskUpdateSchema,
  toValidationDetails,
  TITLE_MAX_LENGTH,
  BODY_FIELD,
} from './task-validator.js';
export type { NewTaskInput, TaskPatch } from './task-validator.js';
export {
  validateListQuery,
  listQuerySchema,
  DEFAULT_SKIP,
  DEFAULT_LIMIT,
  MAX_LIMIT,
} from './list-query.js';
