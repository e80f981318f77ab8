import { z } from 'zod';

// Request validators. Query parameters arrive as strings (or arrays when
// repeated), so each filter is parsed from its text form.

const nonNegativeInteger = (name: string) =>
  z
    .string({ invalid_type_error: `${name} must be given once` })
    .regex(/^\d+$/, `${name} must be a non-negative integer`)
    .transform(text => Number.parseInt(text, 10));

export const filterQuerySchema = z.object({
  is_palindrome: z
    .enum(['true', 'false'], {
      errorMap: () => ({ message: 'is_palindrome must be "true" or "false"' }),
    })
    .transform(text => text === 'true')
    .optional(),
  min_length: nonNegativeInteger('min_length').optional(),
  max_length: nonNegativeInteger('max_length').optional(),
  word_count: nonNegativeInteger('word_count').optional(),
  contains_character: z
    .string({ invalid_type_error: 'contains_character must be given once' })
    .refine(text => Array.from(text).length === 1, 'contains_character must be a single character')
    .optional(),
});

export type FilterQuery = z.infer<typeof filterQuerySchema>;

export const createStringBodySchema = z.object(
  {
    value: z.string({
      required_error: 'Missing "value" field',
      invalid_type_error: 'Invalid data type for "value" (must be string)',
    }),
  },
  {
    required_error: 'Request body must be a JSON object',
    invalid_type_error: 'Request body must be a JSON object',
  },
);

export const naturalLanguageQuerySchema = z.object({
  query: z.string({
    required_error: 'Missing "query" parameter',
    invalid_type_error: '"query" must be given once',
  }),
});

// First issue message, prefixed the way error bodies read
export function describeIssues(error: z.ZodError): string {
  const [issue] = error.issues;
  return `Bad Request: ${issue?.message ?? 'Invalid request'}`;
}
