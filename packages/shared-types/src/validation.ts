/**
 * Validation utilities for type-safe JSON parsing
 * Uses Zod for runtime validation with TypeScript inference
 */

import { z } from 'zod';

/**
 * Safe parse result that preserves type information
 */
export type SafeParseResult<T> =
  | { data: T; error: null; success: true }
  | { data: null; error: z.ZodError; success: false };

/**
 * Safely parse data with Zod schema
 */
export function safeParse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): SafeParseResult<z.infer<T>> {
  const result = schema.safeParse(data);

  if (result.success) {
    return {
      data: result.data,
      error: null,
      success: true,
    };
  }

  return {
    data: null,
    error: result.error,
    success: false,
  };
}

/**
 * Parse a JSON string and validate it in one step.
 * A syntax error is reported as a custom ZodError so callers handle one failure shape.
 */
export function safeParseJson<T extends z.ZodTypeAny>(
  text: string,
  schema: T
): SafeParseResult<z.infer<T>> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return {
      data: null,
      error: new z.ZodError([
        {
          code: 'custom',
          message: error instanceof Error ? error.message : 'Invalid JSON',
          path: [],
        },
      ]),
      success: false,
    };
  }

  return safeParse(schema, json);
}

/**
 * Format Zod error for logging/display
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((err) => {
      const path = err.path.join('.');
      return `${path ? `${path}: ` : ''}${err.message}`;
    })
    .join(', ');
}
