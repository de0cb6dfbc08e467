/**
 * Validation and normalization of raw task payloads.
 *
 * Every field is checked and all failures are reported together as a
 * field -> message map; nothing here touches storage. "Today" is a parameter
 * so callers (and tests) pin the date the due-date rule compares against.
 */

import { z } from 'zod';
import type { Priority } from '../types/priority.js';
import { PRIORITY_MAX, PRIORITY_MIN, isPriority } from '../types/priority.js';
import type { ValidationDetails, ValidationResult } from '../types/results.js';
import { isIsoDate, todayString } from '../parsers/date-parser.js';

export const TITLE_MAX_LENGTH = 200;

/** Key used when the payload as a whole is unusable */
export const BODY_FIELD = 'body';

export interface NewTaskInput {
  title: string;
  description: string | null;
  priority: Priority;
  dueDate: string;
  completed: boolean;
  tags: string[];
}

/** Only the keys present in the request; absent keys leave the task untouched */
export interface TaskPatch {
  title?: string;
  description?: string | null;
  priority?: Priority;
  dueDate?: string;
  completed?: boolean;
  tags?: string[];
}

/** Length in code points, so an emoji counts once */
function characterCount(value: string): number {
  return [...value].length;
}

const titleSchema = z
  .string({ required_error: 'Title is required', invalid_type_error: 'Title must be a string' })
  .trim()
  .min(1, 'Title must not be empty')
  .refine(
    value => characterCount(value) <= TITLE_MAX_LENGTH,
    `Title must be at most ${TITLE_MAX_LENGTH} characters`,
  );

const descriptionSchema = z
  .string({ invalid_type_error: 'Description must be a string' })
  .nullable();

const prioritySchema = z
  .number({ required_error: 'Priority is required', invalid_type_error: 'Priority must be an integer' })
  .int('Priority must be an integer')
  .refine(isPriority, `Priority must be between ${PRIORITY_MIN} and ${PRIORITY_MAX}`);

const completedSchema = z.boolean({ invalid_type_error: 'Completed must be a boolean' });

const tagsSchema = z.array(
  z.string({ invalid_type_error: 'Tag names must be strings' })
    .refine(name => name.trim().length > 0, 'Tag names must not be empty'),
  { invalid_type_error: 'Tags must be a list of strings' },
);

function dueDateSchema(today: string) {
  return z
    .string({ required_error: 'Due date is required', invalid_type_error: 'Due date must be a string' })
    .superRefine((value, ctx) => {
      if (!isIsoDate(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Due date must be a valid date (yyyy-MM-dd)' });
      } else if (value < today) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Due date cannot be in the past' });
      }
    });
}

const OBJECT_ERRORS = {
  required_error: 'Request body is required',
  invalid_type_error: 'Request body must be a JSON object',
};

export function taskCreateSchema(today: string) {
  return z.object({
    title: titleSchema,
    description: descriptionSchema.optional(),
    priority: prioritySchema,
    due_date: dueDateSchema(today),
    completed: completedSchema.optional(),
    tags: tagsSchema.optional(),
  }, OBJECT_ERRORS);
}

export function taskUpdateSchema(today: string) {
  return z.object({
    title: titleSchema.optional(),
    description: descriptionSchema.optional(),
    priority: prioritySchema.optional(),
    due_date: dueDateSchema(today).optional(),
    completed: completedSchema.optional(),
    tags: tagsSchema.optional(),
  }, OBJECT_ERRORS);
}

/**
 * Collapse zod issues into one message per top-level field.
 * The first issue reported for a field wins.
 */
export function toValidationDetails(error: z.ZodError): ValidationDetails {
  const details: Record<string, string> = {};
  for (const issue of error.issues) {
    const head = issue.path[0];
    const field = head === undefined ? BODY_FIELD : String(head);
    if (!(field in details)) details[field] = issue.message;
  }
  return details;
}

/** Validate a create payload; `today` is yyyy-MM-dd */
export function validateTaskCreate(raw: unknown, today: string = todayString()): ValidationResult<NewTaskInput> {
  const parsed = taskCreateSchema(today).safeParse(raw);
  if (!parsed.success) return { type: 'invalid', details: toValidationDetails(parsed.error) };

  const data = parsed.data;
  return {
    type: 'valid',
    value: {
      title: data.title,
      description: data.description ?? null,
      priority: data.priority,
      dueDate: data.due_date,
      completed: data.completed ?? false,
      tags: data.tags ?? [],
    },
  };
}

/** Validate a partial update payload; `today` is yyyy-MM-dd */
export function validateTaskUpdate(raw: unknown, today: string = todayString()): ValidationResult<TaskPatch> {
  const parsed = taskUpdateSchema(today).safeParse(raw);
  if (!parsed.success) return { type: 'invalid', details: toValidationDetails(parsed.error) };

  const data = parsed.data;
  const patch: TaskPatch = {};
  if (data.title !== undefined) patch.title = data.title;
  if (data.description !== undefined) patch.description = data.description;
  if (data.priority !== undefined) patch.priority = data.priority;
  if (data.due_date !== undefined) patch.dueDate = data.due_date;
  if (data.completed !== undefined) patch.completed = data.completed;
  if (data.tags !== undefined) patch.tags = data.tags;
  return { type: 'valid', value: patch };
}
