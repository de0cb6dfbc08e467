/**
 * Validation for list query parameters. Values usually arrive as strings
 * (HTTP query string, CLI flags) and are coerced here.
 */

import { z } from 'zod';
import { PRIORITY_MAX, PRIORITY_MIN, isPriority } from '../types/priority.js';
import type { TaskListQuery } from '../types/task.js';
import type { ValidationResult } from '../types/results.js';
import { toValidationDetails } from './task-validator.js';

export const DEFAULT_SKIP = 0;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

const BOOLEAN_STRINGS: Record<string, boolean> = {
  true: true,
  false: false,
  '1': true,
  '0': false,
};

const booleanParam = z.union([
  z.boolean(),
  z.string().transform((value, ctx) => {
    const parsed = BOOLEAN_STRINGS[value.toLowerCase()];
    if (parsed === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Completed must be true or false' });
      return z.NEVER;
    }
    return parsed;
  }),
], { errorMap: () => ({ message: 'Completed must be true or false' }) });

const integerParam = (field: string) => z.coerce
  .number({ invalid_type_error: `${field} must be an integer` })
  .int(`${field} must be an integer`);

export const listQuerySchema = z.object({
  skip: integerParam('Skip').min(0, 'Skip must not be negative').default(DEFAULT_SKIP),
  limit: integerParam('Limit')
    .min(1, 'Limit must be at least 1')
    .max(MAX_LIMIT, `Limit must be at most ${MAX_LIMIT}`)
    .default(DEFAULT_LIMIT),
  completed: booleanParam.optional(),
  priority: integerParam('Priority')
    .refine(isPriority, `Priority must be between ${PRIORITY_MIN} and ${PRIORITY_MAX}`)
    .optional(),
  tags: z.string({ invalid_type_error: 'Tags must be a comma-separated string' }).optional(),
});

/** Validate raw list parameters, filling in paging defaults */
export function validateListQuery(raw: unknown): ValidationResult<TaskListQuery> {
  const parsed = listQuerySchema.safeParse(raw ?? {});
  if (!parsed.success) return { type: 'invalid', details: toValidationDetails(parsed.error) };
  return { type: 'valid', value: parsed.data };
}
