/**
 * Stage 1: Terminology unification (deep mode)
 *
 * Resolves the glossary for the job from an excerpt at the start of the
 * document. Never fails the job: extraction problems yield an empty glossary.
 */

import type { ILLMProvider } from '../interfaces/llm-provider.js';
import type { TranslationConfig, TranslationMode } from '../types/common.js';
import type { Glossary } from '../types/glossary.js';
import type { StageResult } from '../types/pipeline.js';
import { GlossaryResolver, type GlossaryResolution } from '../glossary/glossary-resolver.js';
import type { RetryPolicy } from '../utils/retry.js';

export interface TerminologyStageOptions {
  retry?: RetryPolicy;
  excerptChars: number;
}

export class TerminologyStage {
  private resolver: GlossaryResolver;
  private excerptChars: number;

  constructor(provider: ILLMProvider, options: TerminologyStageOptions) {
    this.resolver = new GlossaryResolver(provider, { retry: options.retry });
    this.excerptChars = options.excerptChars;
  }

  async execute(
    document: string,
    userGlossary: Glossary | null,
    mode: TranslationMode,
    config: TranslationConfig,
    signal?: AbortSignal
  ): Promise<StageResult<GlossaryResolution>> {
    const startTime = Date.now();
    const excerpt = document.slice(0, this.excerptChars);

    const resolution = await this.resolver.resolve(excerpt, userGlossary, mode, config, signal);

    return {
      stage: 'terminology',
      success: resolution.origin !== 'fallback',
      data: resolution,
      error: resolution.warning,
      tokensUsed: resolution.tokensUsed,
      generationCalls: resolution.generationCalls,
      duration: Date.now() - startTime,
    };
  }
}
