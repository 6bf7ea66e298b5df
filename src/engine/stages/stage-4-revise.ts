/**
 * Stage 4: Revision (deep mode)
 *
 * Re-generates each chunk once with the critique findings that concern it.
 * The engine keeps the existing translation for a chunk whose revision fails.
 */

import type { ILLMProvider, Message } from '../interfaces/llm-provider.js';
import type { TranslationConfig } from '../types/common.js';
import type { Chunk, Critique } from '../types/pipeline.js';
import { createReviserPrompt, createReviserSystemPrompt } from '../prompts/system/reviser.js';
import { GlossaryManager } from '../glossary/glossary-manager.js';
import { restoreBoundaryWhitespace, splitBoundaryWhitespace } from '../utils/chunker.js';
import { withRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from '../utils/retry.js';
import type { TaskOutcome, WorkerPool } from '../utils/worker-pool.js';
import {
  stripWrappingFence,
  type ChunkGeneration,
  type ChunkStageHooks,
  type GenerationStageOptions,
} from './stage-2-translate.js';
import { EMPTY_USAGE } from '../types/common.js';
import { createLogger } from '../../logger.js';

const log = createLogger('revise-stage');

/**
 * Document-level findings plus the ones attributed to this chunk
 */
export function findingsForChunk(critique: Critique, index: number): string[] {
  const attributed = critique.chunkIssues?.filter((entry) => entry.index === index).flatMap((entry) => entry.issues) ?? [];
  return [...critique.issues, ...attributed];
}

export class ReviseStage {
  private provider: ILLMProvider;
  private retry: RetryPolicy;
  private temperature: number;
  private maxTokens: number;

  constructor(provider: ILLMProvider, options: GenerationStageOptions = {}) {
    this.provider = provider;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.temperature = options.temperature ?? 0.3;
    this.maxTokens = options.maxTokens ?? 4096;
  }

  async reviseAll(
    chunks: readonly Chunk[],
    critique: Critique,
    glossary: GlossaryManager,
    config: TranslationConfig,
    pool: WorkerPool,
    hooks: ChunkStageHooks = {}
  ): Promise<TaskOutcome<Chunk, ChunkGeneration>[]> {
    return pool.run(
      chunks,
      (chunk) => this.reviseChunk(chunk, findingsForChunk(critique, chunk.index), glossary, config, hooks.signal),
      {
        signal: hooks.signal,
        onStart: hooks.onStart,
        onSettled: hooks.onSettled,
      }
    );
  }

  async reviseChunk(
    chunk: Chunk,
    findings: string[],
    glossary: GlossaryManager,
    config: TranslationConfig,
    signal?: AbortSignal
  ): Promise<ChunkGeneration> {
    if (chunk.translatedText === null) {
      throw new Error(`Chunk ${chunk.index} has no translation to revise`);
    }

    const source = splitBoundaryWhitespace(chunk.sourceText).core;
    const translated = splitBoundaryWhitespace(chunk.translatedText).core;
    if (source.length === 0) {
      return { text: chunk.translatedText, tokensUsed: EMPTY_USAGE, attempts: 0 };
    }

    const messages: Message[] = [
      { role: 'system', content: createReviserSystemPrompt(config) },
      {
        role: 'user',
        content: createReviserPrompt(source, translated, findings, glossary.toPromptText(config.targetLang, source)),
      },
    ];

    const { value, attempts } = await withRetry(
      (attemptSignal) =>
        this.provider.complete(messages, {
          temperature: this.temperature,
          maxTokens: this.maxTokens,
          signal: attemptSignal,
        }),
      this.retry,
      {
        signal,
        onRetry: ({ attempt, delayMs, error }) =>
          log.warn({ chunkIndex: chunk.index, attempt, delayMs, err: error }, 'Chunk revision failed, retrying'),
      }
    );

    return {
      text: restoreBoundaryWhitespace(chunk.sourceText, stripWrappingFence(value.content, source)),
      tokensUsed: value.tokensUsed,
      attempts,
    };
  }
}
