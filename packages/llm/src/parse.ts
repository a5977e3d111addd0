/**
 * JSON response parsing utilities with Zod validation.
 */

import type { ZodType, ZodTypeDef } from 'zod';

export type ParseResult<T> =
  | { success: true; data: T; rawResponse: string }
  | { success: false; error: string; rawResponse: string };

/**
 * Extract JSON from a response that may contain markdown code blocks.
 */
export function extractJson(response: string): string {
  const trimmed = response.trim();

  // Try to extract from markdown code blocks
  const jsonBlockMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonBlockMatch) {
    return jsonBlockMatch[1].trim();
  }

  // Try to find JSON object or array
  const jsonMatch = trimmed.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
  if (jsonMatch) {
    return jsonMatch[1];
  }

  return trimmed;
}

/**
 * Parse and validate JSON response against a Zod schema.
 */
export function parseJsonResponse<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ParseResult<T> {
  const rawResponse = response;

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(response));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: `Invalid JSON: ${message}`, rawResponse };
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    const issues = validated.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    return { success: false, error: `Validation failed: ${issues}`, rawResponse };
  }

  return { success: true, data: validated.data, rawResponse };
}

/**
 * Parse JSON response, applying fixers one after another for common LLM output issues.
 */
export function parseWithRetry<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fixers?: Array<(input: string) => string>,
): ParseResult<T> {
  let result = parseJsonResponse(response, schema);
  if (result.success) return result;

  if (fixers) {
    let fixed = response;
    for (const fixer of fixers) {
      fixed = fixer(fixed);
      result = parseJsonResponse(fixed, schema);
      if (result.success) return { ...result, rawResponse: response };
    }
  }

  return { ...result, rawResponse: response };
}

/**
 * Common JSON fixers for LLM output issues.
 */
export const jsonFixers = {
  /** Remove trailing commas in arrays/objects */
  removeTrailingCommas: (input: string): string => {
    return input.replace(/,\s*([}\]])/g, '$1');
  },

  /** Fix unquoted keys */
  quoteKeys: (input: string): string => {
    return input.replace(/([{,])\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*:/g, '$1"$2":');
  },
};

export const defaultFixers = [jsonFixers.removeTrailingCommas, jsonFixers.quoteKeys];
