import { z } from 'zod';
import { ValidationError, type FieldErrors } from './errors.js';

const REQUIRED = 'This field is required.';

function text(max?: number) {
  const base = z.string({ required_error: REQUIRED, invalid_type_error: 'Not a valid string.' });
  const bounded = max ? base.max(max, `Ensure this field has no more than ${max} characters.`) : base;
  return bounded.refine(value => value.trim().length > 0, { message: 'This field may not be blank.' });
}

const flag = z.boolean({ required_error: REQUIRED, invalid_type_error: 'Must be a valid boolean.' });

export const postWriteSchema = z.object({
  title: text(200),
  body: text(),
  slug: z
    .string({ invalid_type_error: 'Not a valid string.' })
    .max(50, 'Ensure this field has no more than 50 characters.')
    .regex(/^[-a-z0-9_]+$/i, 'Enter a valid slug consisting of letters, numbers, underscores or hyphens.')
    .optional(),
  is_published: flag.optional(),
});

export const postPatchSchema = postWriteSchema.partial();

export type PostWrite = z.infer<typeof postWriteSchema>;
export type PostPatch = z.infer<typeof postPatchSchema>;

export const commentCreateSchema = z.object({
  post: z
    .number({ required_error: REQUIRED, invalid_type_error: 'Incorrect type. Expected pk value.' })
    .int('Incorrect type. Expected pk value.')
    .positive('Invalid pk - object does not exist.'),
  body: text(),
});

export const commentWriteSchema = z.object({
  body: text(),
  is_approved: flag.optional(),
});

export const commentPatchSchema = commentWriteSchema.partial();

export type CommentCreate = z.infer<typeof commentCreateSchema>;
export type CommentWrite = z.infer<typeof commentPatchSchema>;

function toFieldErrors(error: z.ZodError): FieldErrors {
  const flat = error.flatten();
  const details: FieldErrors = {};
  for (const [field, messages] of Object.entries(flat.fieldErrors)) {
    if (messages?.length) details[field] = messages;
  }
  if (flat.formErrors.length) {
    details.non_field_errors = flat.formErrors;
  }
  return details;
}

/** Parses a request payload, raising ValidationError with per-field messages. */
export function validate<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error));
  }
  return result.data;
}
