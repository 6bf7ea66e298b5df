/**
 * Glossary Resolver - decides which glossary a job translates with
 *
 * quick mode       → empty glossary, no generation call
 * deep + user list → the user glossary as given
 * deep + nothing   → terms extracted from an excerpt by the model
 *
 * Extraction failures degrade to an empty glossary.
 */

import { z } from 'zod';
import type { ILLMProvider, Message } from '../interfaces/llm-provider.js';
import type { TokenUsage, TranslationConfig, TranslationMode } from '../types/common.js';
import { EMPTY_USAGE, addUsage } from '../types/common.js';
import type { Glossary } from '../types/glossary.js';
import { GlossaryManager, glossaryTermSchema } from './glossary-manager.js';
import { TERMINOLOGY_SYSTEM_PROMPT, createTerminologyPrompt } from '../prompts/system/terminology.js';
import { withRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from '../utils/retry.js';
import { parseModelJson } from '../utils/json.js';
import { JobCancelledError, describeError } from '../errors.js';
import { createLogger } from '../../logger.js';

const log = createLogger('glossary-resolver');

const extractionSchema = z.union([
  z.object({ terms: z.array(z.unknown()) }).transform((data) => data.terms),
  z.array(z.unknown()),
]);

export type GlossaryOrigin = 'skipped' | 'user' | 'extracted' | 'fallback';

export interface GlossaryResolution {
  glossary: Glossary;
  origin: GlossaryOrigin;
  tokensUsed: TokenUsage;
  generationCalls: number;
  /** Why extraction fell back to an empty glossary */
  warning?: string;
}

export interface GlossaryResolverOptions {
  retry?: RetryPolicy;
  temperature?: number;
}

export class GlossaryResolver {
  private provider: ILLMProvider;
  private retry: RetryPolicy;
  private temperature: number;

  constructor(provider: ILLMProvider, options: GlossaryResolverOptions = {}) {
    this.provider = provider;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.temperature = options.temperature ?? 0.2;
  }

  async resolve(
    excerpt: string,
    userGlossary: Glossary | null,
    mode: TranslationMode,
    config: TranslationConfig,
    signal?: AbortSignal
  ): Promise<GlossaryResolution> {
    if (mode === 'quick') {
      return { glossary: [], origin: 'skipped', tokensUsed: EMPTY_USAGE, generationCalls: 0 };
    }

    if (userGlossary !== null) {
      return { glossary: userGlossary, origin: 'user', tokensUsed: EMPTY_USAGE, generationCalls: 0 };
    }

    // every call counts, including attempts whose output could not be parsed
    let generationCalls = 0;
    let tokensUsed = EMPTY_USAGE;
    try {
      const messages: Message[] = [
        { role: 'system', content: TERMINOLOGY_SYSTEM_PROMPT },
        { role: 'user', content: createTerminologyPrompt(excerpt, config) },
      ];

      const { value: entries } = await withRetry(
        async (attemptSignal) => {
          generationCalls++;
          const response = await this.provider.complete(messages, {
            temperature: this.temperature,
            json: true,
            signal: attemptSignal,
          });
          tokensUsed = addUsage(tokensUsed, response.tokensUsed);
          return parseModelJson(response.content, extractionSchema);
        },
        this.retry,
        { signal }
      );

      const manager = new GlossaryManager();
      let dropped = 0;
      for (const entry of entries) {
        const term = glossaryTermSchema.safeParse(entry);
        if (term.success) {
          manager.addTerm(term.data);
        } else {
          dropped++;
        }
      }

      log.info({ terms: manager.size, dropped }, 'Extracted terminology');
      return {
        glossary: manager.getTerms(),
        origin: 'extracted',
        tokensUsed,
        generationCalls,
      };
    } catch (error) {
      if (error instanceof JobCancelledError) throw error;

      const warning = `Terminology extraction failed, continuing without a glossary: ${describeError(error)}`;
      log.warn({ err: error }, warning);
      return { glossary: [], origin: 'fallback', tokensUsed, generationCalls, warning };
    }
  }
}
