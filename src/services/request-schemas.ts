/**
 * Validation of incoming API payloads (snake_case) into service requests
 */

import { z } from 'zod';
import { glossaryTermSchema, type Glossary, type ProviderName, type TranslationMode } from '../engine/index.js';
import { ValidationError } from './errors.js';

export type GlossarySelector = 'none' | 'default' | { id: string } | { terms: Glossary };

export interface TranslationConfigInput {
  sourceLang: string;
  targetLang: string;
  provider?: ProviderName;
  model?: string;
  targetLanguageAccent?: string;
  translationMode?: TranslationMode;
  contentType?: string;
}

export interface SubmitJobRequest {
  jobId?: string;
  originalContent: string;
  originalFilename?: string | null;
  config: TranslationConfigInput;
  glossary: GlossarySelector;
}

const JOB_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export const configSchema = z
  .object({
    source_lang: z.string().trim().min(1),
    target_lang: z.string().trim().min(1),
    provider: z.enum(['openai', 'openrouter', 'gemini', 'ollama']).optional(),
    model: z.string().trim().min(1).optional(),
    target_language_accent: z.string().trim().min(1).optional(),
    translation_mode: z.enum(['quick', 'deep']).optional(),
    content_type: z.string().trim().min(1).optional(),
  })
  .transform(
    (config): TranslationConfigInput => ({
      sourceLang: config.source_lang,
      targetLang: config.target_lang,
      provider: config.provider,
      model: config.model,
      targetLanguageAccent: config.target_language_accent,
      translationMode: config.translation_mode,
      contentType: config.content_type,
    })
  );

export const glossarySelectorSchema = z
  .union([z.string().trim().min(1), z.array(glossaryTermSchema)])
  .optional()
  .transform((value): GlossarySelector => {
    if (value === undefined || value === 'none') return 'none';
    if (value === 'default') return 'default';
    if (typeof value === 'string') return { id: value };
    return { terms: value };
  });

export const submitJobSchema = z
  .object({
    job_id: z.string().regex(JOB_ID_PATTERN, 'job_id may only contain letters, digits, "-" and "_"').optional(),
    original_content: z.string().min(1),
    original_filename: z.string().trim().min(1).max(255).optional(),
    config: configSchema,
    glossary: glossarySelectorSchema,
  })
  .transform(
    (body): SubmitJobRequest => ({
      jobId: body.job_id,
      originalContent: body.original_content,
      originalFilename: body.original_filename ?? null,
      config: body.config,
      glossary: body.glossary,
    })
  );

export const glossaryBodySchema = z.object({
  name: z.string().trim().min(1).max(200),
  terms: z.array(glossaryTermSchema),
  is_default: z.boolean().optional(),
});

export const glossaryUpdateSchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    terms: z.array(glossaryTermSchema).optional(),
  })
  .refine((body) => body.name !== undefined || body.terms !== undefined, {
    message: 'name or terms is required',
  });

export const listJobsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
  status: z.enum(['pending', 'running', 'completed', 'failed']).optional(),
});

/**
 * Parse with a schema, turning zod issues into a ValidationError
 */
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what = 'request'): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.') || what}: ${issue.message}`);
    throw new ValidationError(`Invalid ${what}`, details);
  }
  return result.data;
}
