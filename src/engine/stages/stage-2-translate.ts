/**
 * Stage 2: Translation
 *
 * Translates every chunk independently through the worker pool. Each call
 * carries the chunk text, the glossary terms found in it and the style
 * directive. A chunk that exhausts its retries fails alone; siblings keep going.
 */

import type { ILLMProvider, Message } from '../interfaces/llm-provider.js';
import type { TokenUsage, TranslationConfig } from '../types/common.js';
import { EMPTY_USAGE } from '../types/common.js';
import type { Chunk } from '../types/pipeline.js';
import { createTranslatorPrompt, createTranslatorSystemPrompt } from '../prompts/system/translator.js';
import { GlossaryManager } from '../glossary/glossary-manager.js';
import { restoreBoundaryWhitespace, splitBoundaryWhitespace } from '../utils/chunker.js';
import { withRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from '../utils/retry.js';
import type { TaskOutcome, WorkerPool } from '../utils/worker-pool.js';
import { createLogger } from '../../logger.js';

const log = createLogger('translate-stage');

export interface ChunkGeneration {
  text: string;
  tokensUsed: TokenUsage;
  attempts: number;
}

export interface ChunkStageHooks {
  signal?: AbortSignal;
  onStart?: (chunk: Chunk) => void | Promise<void>;
  onSettled?: (outcome: TaskOutcome<Chunk, ChunkGeneration>) => void | Promise<void>;
}

export interface GenerationStageOptions {
  retry?: RetryPolicy;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Drop a code fence the model wrapped around its whole answer,
 * unless the source itself was a fenced block
 */
export function stripWrappingFence(output: string, source: string): string {
  const trimmed = output.trim();
  if (source.trim().startsWith('```')) return trimmed;

  const match = /^```[\w-]*\r?\n([\s\S]*?)\r?\n?```$/.exec(trimmed);
  return match ? match[1] : trimmed;
}

export class TranslateStage {
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

  /**
   * Translate all given chunks; resolves once every chunk settled
   */
  async translateAll(
    chunks: readonly Chunk[],
    glossary: GlossaryManager,
    config: TranslationConfig,
    pool: WorkerPool,
    hooks: ChunkStageHooks = {}
  ): Promise<TaskOutcome<Chunk, ChunkGeneration>[]> {
    log.debug({ chunks: chunks.length, concurrency: pool.concurrency }, 'Translating chunks');

    return pool.run(chunks, (chunk) => this.translateChunk(chunk, glossary, config, hooks.signal), {
      signal: hooks.signal,
      onStart: hooks.onStart,
      onSettled: hooks.onSettled,
    });
  }

  async translateChunk(
    chunk: Chunk,
    glossary: GlossaryManager,
    config: TranslationConfig,
    signal?: AbortSignal
  ): Promise<ChunkGeneration> {
    const { core } = splitBoundaryWhitespace(chunk.sourceText);
    if (core.length === 0) {
      return { text: chunk.sourceText, tokensUsed: EMPTY_USAGE, attempts: 0 };
    }

    const messages: Message[] = [
      { role: 'system', content: createTranslatorSystemPrompt(config) },
      {
        role: 'user',
        content: createTranslatorPrompt(core, glossary.toPromptText(config.targetLang, core)),
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
          log.warn({ chunkIndex: chunk.index, attempt, delayMs, err: error }, 'Chunk translation failed, retrying'),
      }
    );

    if (value.finishReason === 'length') {
      log.warn({ chunkIndex: chunk.index }, 'Translation hit the token limit and may be truncated');
    }

    return {
      text: restoreBoundaryWhitespace(chunk.sourceText, stripWrappingFence(value.content, core)),
      tokensUsed: value.tokensUsed,
      attempts,
    };
  }
}
