/**
 * Zod validation helpers
 *
 * @module utils/validation
 */

import { z } from 'zod';

/**
 * Validation error with a message naming every failing path
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Render zod issues as `path: message` strings
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => {
    const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
    return `${path}${e.message}`;
  });
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param label - What is being validated, used as the message prefix
 * @throws ValidationError listing every issue
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ValidationError(`Invalid ${label}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
