/**
 * Parse JSON out of model output that may be wrapped in prose or code fences
 */

import type { z } from 'zod';
import { GenerationTransientError } from '../errors.js';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

export function extractJson(text: string): unknown {
  const fenced = FENCED_BLOCK.exec(text);
  const candidate = (fenced ? fenced[1] : text).trim();

  try {
    return JSON.parse(candidate);
  } catch {
    const start = candidate.search(/[[{]/);
    const end = Math.max(candidate.lastIndexOf('}'), candidate.lastIndexOf(']'));
    if (start === -1 || end <= start) {
      throw new GenerationTransientError('Model output contains no JSON');
    }
    try {
      return JSON.parse(candidate.slice(start, end + 1));
    } catch (error) {
      throw new GenerationTransientError('Model output is not valid JSON', { cause: error });
    }
  }
}

/**
 * Parse and validate model output; a mismatch counts as malformed output
 */
export function parseModelJson<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const result = schema.safeParse(extractJson(text));
  if (!result.success) {
    const detail = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new GenerationTransientError(`Model output has unexpected shape: ${detail}`);
  }
  return result.data;
}
