/**
 * Stage 3: Critique (deep mode)
 *
 * Reviews the full set of translated chunks once the translation barrier is
 * passed. Long documents are reviewed in batches whose verdicts are merged:
 * the document is critical when any batch is. A failed review counts as a
 * critical error, reported through `success: false`.
 */

import { z } from 'zod';
import type { ILLMProvider, Message } from '../interfaces/llm-provider.js';
import type { TokenUsage, TranslationConfig } from '../types/common.js';
import { EMPTY_USAGE, addUsage } from '../types/common.js';
import type { Chunk, ChunkIssues, Critique, StageResult } from '../types/pipeline.js';
import { CRITIC_SYSTEM_PROMPT, createCritiquePrompt, type CritiqueSection } from '../prompts/system/critic.js';
import { GlossaryManager } from '../glossary/glossary-manager.js';
import { withRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from '../utils/retry.js';
import { parseModelJson } from '../utils/json.js';
import type { WorkerPool } from '../utils/worker-pool.js';
import { JobCancelledError, describeError } from '../errors.js';
import { createLogger } from '../../logger.js';

const log = createLogger('critique-stage');

const flagSchema = z.union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')]);

const critiqueResponseSchema = z.object({
  has_critical_error: flagSchema,
  issues: z.array(z.string()).default([]),
  chunk_issues: z
    .array(
      z.object({
        index: z.coerce.number().int(),
        issues: z.array(z.string()),
      })
    )
    .optional(),
});

export interface CritiqueStageOptions {
  retry?: RetryPolicy;
  temperature?: number;
  /** Max characters (source + translation) reviewed per call */
  batchChars: number;
}

/** Usage of every review call, parsed or not, across all batches */
interface UsageMeter {
  tokensUsed: TokenUsage;
  generationCalls: number;
}

/**
 * Group chunks, in index order, into batches under the character budget.
 * A chunk larger than the budget gets a batch of its own.
 */
export function batchChunks(chunks: readonly Chunk[], batchChars: number): Chunk[][] {
  const sorted = [...chunks].sort((a, b) => a.index - b.index);
  const batches: Chunk[][] = [];
  let current: Chunk[] = [];
  let size = 0;

  for (const chunk of sorted) {
    const chunkSize = chunk.sourceText.length + (chunk.translatedText?.length ?? 0);
    if (current.length > 0 && size + chunkSize > batchChars) {
      batches.push(current);
      current = [];
      size = 0;
    }
    current.push(chunk);
    size += chunkSize;
  }

  if (current.length > 0) {
    batches.push(current);
  }
  return batches;
}

export function mergeCritiques(critiques: readonly Critique[]): Critique {
  const chunkIssues = new Map<number, string[]>();
  for (const critique of critiques) {
    for (const entry of critique.chunkIssues ?? []) {
      chunkIssues.set(entry.index, [...(chunkIssues.get(entry.index) ?? []), ...entry.issues]);
    }
  }

  const merged: Critique = {
    hasCriticalError: critiques.some((c) => c.hasCriticalError),
    issues: critiques.flatMap((c) => c.issues),
  };
  if (chunkIssues.size > 0) {
    merged.chunkIssues = [...chunkIssues.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, issues]): ChunkIssues => ({ index, issues }));
  }
  return merged;
}

export class CritiqueStage {
  private provider: ILLMProvider;
  private retry: RetryPolicy;
  private temperature: number;
  private batchChars: number;

  constructor(provider: ILLMProvider, options: CritiqueStageOptions) {
    this.provider = provider;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.temperature = options.temperature ?? 0.2;
    this.batchChars = options.batchChars;
  }

  async execute(
    chunks: readonly Chunk[],
    glossary: GlossaryManager,
    config: TranslationConfig,
    pool: WorkerPool,
    signal?: AbortSignal
  ): Promise<StageResult<Critique>> {
    const startTime = Date.now();
    const batches = batchChunks(chunks, this.batchChars);

    const meter: UsageMeter = { tokensUsed: EMPTY_USAGE, generationCalls: 0 };

    const outcomes = await pool.run(batches, (batch) => this.reviewBatch(batch, glossary, config, meter, signal), {
      signal,
    });

    const { tokensUsed, generationCalls } = meter;
    const verdicts: Critique[] = [];
    const failures: string[] = [];

    for (const outcome of outcomes) {
      if (outcome.ok) {
        verdicts.push(outcome.value);
      } else {
        if (outcome.error instanceof JobCancelledError) throw outcome.error;
        failures.push(describeError(outcome.error));
      }
    }

    if (failures.length > 0) {
      log.error({ failures }, 'Critique generation failed');
      return {
        stage: 'critique',
        success: false,
        error: `Critique failed: ${failures.join('; ')}`,
        tokensUsed,
        generationCalls,
        duration: Date.now() - startTime,
      };
    }

    const critique = mergeCritiques(verdicts);
    log.info(
      { batches: batches.length, critical: critique.hasCriticalError, issues: critique.issues.length },
      'Critique completed'
    );

    return {
      stage: 'critique',
      success: true,
      data: critique,
      tokensUsed,
      generationCalls,
      duration: Date.now() - startTime,
    };
  }

  private async reviewBatch(
    batch: Chunk[],
    glossary: GlossaryManager,
    config: TranslationConfig,
    meter: UsageMeter,
    signal?: AbortSignal
  ): Promise<Critique> {
    const sections: CritiqueSection[] = batch.map((chunk) => ({
      index: chunk.index,
      source: chunk.sourceText,
      translation: chunk.translatedText ?? '',
    }));
    const sourceText = batch.map((chunk) => chunk.sourceText).join('');

    const messages: Message[] = [
      { role: 'system', content: CRITIC_SYSTEM_PROMPT },
      {
        role: 'user',
        content: createCritiquePrompt(sections, glossary.toPromptText(config.targetLang, sourceText), config),
      },
    ];

    const { value: parsed } = await withRetry(
      async (attemptSignal) => {
        meter.generationCalls++;
        const response = await this.provider.complete(messages, {
          temperature: this.temperature,
          json: true,
          signal: attemptSignal,
        });
        meter.tokensUsed = addUsage(meter.tokensUsed, response.tokensUsed);
        return parseModelJson(response.content, critiqueResponseSchema);
      },
      this.retry,
      { signal }
    );

    const indexes = new Set(batch.map((chunk) => chunk.index));
    const critique: Critique = {
      hasCriticalError: parsed.has_critical_error,
      issues: parsed.issues,
    };
    const attributed = (parsed.chunk_issues ?? []).filter(
      (entry) => indexes.has(entry.index) && entry.issues.length > 0
    );
    if (attributed.length > 0) {
      critique.chunkIssues = attributed;
    }

    return critique;
  }
}
