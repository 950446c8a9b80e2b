/**
 * Validation utilities for type-safe JSON parsing
 * Uses Zod for runtime validation with TypeScript inference
 */

import {z} from 'zod'

/**
 * Safe parse result that preserves type information
 */
export type SafeParseResult<T> = {data: null; error: z.ZodError; success: false} | {data: T; error: null; success: true}

/**
 * Safely parse data with Zod schema
 * Returns typed result or null with error details
 */
export function safeParse<T extends z.ZodTypeAny>(schema: T, data: unknown): SafeParseResult<z.output<T>> {
  const result = schema.safeParse(data)

  if (result.success) {
    return {
      data: result.data,
      error: null,
      success: true,
    }
  } else {
    return {
      data: null,
      error: result.error,
      success: false,
    }
  }
}

/**
 * Parse data with Zod schema or throw detailed error
 * Use when you want to crash fast on invalid data
 */
export function parse<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  return schema.parse(data)
}

/**
 * Format Zod error for logging/display
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map(err => {
      const path = err.path.join('.')
      return `${path ? `${path}: ` : ''}${err.message}`
    })
    .join(', ')
}
