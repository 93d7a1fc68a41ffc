import { z } from 'zod';
import { FieldError, ValidationError } from './errorHandler';

export function fieldErrorsFromZod(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message
  }));
}

/**
 * Parses caller input against a request schema, raising a `ValidationError`
 * carrying every field error instead of zod's own error.
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${label} request`, fieldErrorsFromZod(parsed.error));
  }
  return parsed.data;
}
