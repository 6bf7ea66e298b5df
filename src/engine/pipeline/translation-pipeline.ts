/**
 * Translation Pipeline - the job state machine
 *
 * quick: chunking → translating → assembling → completed
 * deep:  chunking → terminology_unification → translating → critiquing
 *        → revising → assembling → completed
 *
 * `failed` is reachable from every step. Each step handler reads the current
 * snapshot and returns the next step plus a delta; the pipeline is the only
 * writer of the job and persists and publishes every change.
 */

import type { ILLMProvider } from '../interfaces/llm-provider.js';
import type { IJobEventHub, IJobStore } from '../interfaces/job-store.js';
import type { Chunk, Job, JobDelta, JobLogLevel, PipelineStep, StepTransition } from '../types/pipeline.js';
import { TerminologyStage } from '../stages/stage-1-terminology.js';
import { TranslateStage, type ChunkGeneration } from '../stages/stage-2-translate.js';
import { CritiqueStage } from '../stages/stage-3-critique.js';
import { ReviseStage } from '../stages/stage-4-revise.js';
import { GlossaryManager } from '../glossary/glossary-manager.js';
import { assembleChunks, countWords, splitDocument } from '../utils/chunker.js';
import { WorkerPool, type TaskOutcome } from '../utils/worker-pool.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../utils/retry.js';
import {
  CriticalQualityError,
  JobCancelledError,
  PersistenceError,
  PipelineError,
  describeError,
} from '../errors.js';
import {
  TERMINAL_STEPS,
  addGenerationUsage,
  applyDelta,
  finishMetrics,
  logEntry,
  progressFor,
} from './job-state.js';
import { createLogger } from '../../logger.js';

const log = createLogger('pipeline');

export interface PipelineSettings {
  maxChunkSize: number;
  maxParallelWorkers: number;
  retry: RetryPolicy;
  temperature: number;
  terminologyExcerptChars: number;
  critiqueBatchChars: number;
  /** Newest job log entries kept on the snapshot */
  logLimit: number;
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  maxChunkSize: 2000,
  maxParallelWorkers: 4,
  retry: DEFAULT_RETRY_POLICY,
  temperature: 0.3,
  terminologyExcerptChars: 8000,
  critiqueBatchChars: 12000,
  logLimit: 200,
};

export interface PipelineConfig {
  provider: ILLMProvider;
  store: IJobStore;
  events: IJobEventHub;
  settings?: Partial<PipelineSettings>;
}

export type PipelineRunResult = 'completed' | 'failed' | 'cancelled';

type StepHandler = (run: JobRun) => Promise<StepTransition>;

/**
 * Mutable state of one run. Only the pipeline touches it.
 */
class JobRun {
  job: Job;
  readonly signal?: AbortSignal;

  constructor(job: Job, signal?: AbortSignal) {
    this.job = job;
    this.signal = signal;
  }

  get jobId(): string {
    return this.job.jobId;
  }

  throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw new JobCancelledError(this.jobId);
    }
  }
}

export class TranslationPipeline {
  private store: IJobStore;
  private events: IJobEventHub;
  private settings: PipelineSettings;
  private pool: WorkerPool;

  private terminologyStage: TerminologyStage;
  private translateStage: TranslateStage;
  private critiqueStage: CritiqueStage;
  private reviseStage: ReviseStage;

  private handlers: Record<Exclude<PipelineStep, 'completed' | 'failed'>, StepHandler> = {
    pending: (run) => this.startRun(run),
    chunking: (run) => this.chunkDocument(run),
    terminology_unification: (run) => this.unifyTerminology(run),
    translating: (run) => this.translateChunks(run),
    critiquing: (run) => this.critiqueTranslation(run),
    revising: (run) => this.reviseChunks(run),
    assembling: (run) => this.assembleDocument(run),
  };

  constructor(config: PipelineConfig) {
    this.store = config.store;
    this.events = config.events;
    this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...config.settings };
    this.pool = new WorkerPool(this.settings.maxParallelWorkers);

    const { retry, temperature } = this.settings;
    this.terminologyStage = new TerminologyStage(config.provider, {
      retry,
      excerptChars: this.settings.terminologyExcerptChars,
    });
    this.translateStage = new TranslateStage(config.provider, { retry, temperature });
    this.critiqueStage = new CritiqueStage(config.provider, {
      retry,
      batchChars: this.settings.critiqueBatchChars,
    });
    this.reviseStage = new ReviseStage(config.provider, { retry, temperature });
  }

  /**
   * Run a job from its persisted step until it completes or fails.
   * Rejects only with PersistenceError; cancellation resolves 'cancelled'.
   */
  async run(job: Job, signal?: AbortSignal): Promise<PipelineRunResult> {
    const run = new JobRun(job, signal);
    if (TERMINAL_STEPS.has(job.currentStep)) {
      return job.status === 'completed' ? 'completed' : 'failed';
    }

    log.info({ jobId: job.jobId, mode: job.mode, step: job.currentStep }, 'Pipeline started');

    try {
      if (run.job.status !== 'running') {
        await this.commit(run, (current) => ({
          status: 'running',
          metrics: current.metrics.startTime
            ? current.metrics
            : { ...current.metrics, startTime: new Date().toISOString() },
          logs: [logEntry(current.currentStep, 'info', `Started in ${current.mode} mode`)],
        }));
      }

      let step = run.job.currentStep;
      while (step !== 'completed' && step !== 'failed') {
        run.throwIfCancelled();
        const transition = await this.handlers[step](run);
        await this.transition(run, transition);
        step = transition.next;
      }

      this.finish(run);
      return step;
    } catch (error) {
      return this.handleRunError(run, error);
    }
  }

  private async handleRunError(run: JobRun, error: unknown): Promise<PipelineRunResult> {
    if (error instanceof JobCancelledError || run.signal?.aborted) {
      log.info({ jobId: run.jobId, step: run.job.currentStep }, 'Pipeline cancelled');
      return 'cancelled';
    }
    if (error instanceof PersistenceError) {
      log.error({ jobId: run.jobId, err: error }, 'Job store unavailable, run stopped at last durable state');
      throw error;
    }

    try {
      return await this.failRun(run, error);
    } catch (failure) {
      if (failure instanceof JobCancelledError) return 'cancelled';
      throw failure;
    }
  }

  // ============ Transitions ============

  private async transition(run: JobRun, transition: StepTransition): Promise<void> {
    const { next, delta } = transition;
    const entering: JobDelta = { currentStep: next };

    if (next === 'completed') {
      entering.status = 'completed';
      entering.progressPercent = 100;
    } else if (next === 'failed') {
      entering.status = 'failed';
    } else {
      entering.progressPercent = progressFor(run.job.mode, next);
    }

    const terminal = next === 'completed' || next === 'failed';
    await this.commit(run, (current) => {
      const update: JobDelta = {
        ...delta,
        ...entering,
        logs: [...(delta.logs ?? []), logEntry(next, next === 'failed' ? 'error' : 'info', `Entered ${next}`)],
      };
      if (terminal) {
        update.metrics = finishMetrics(delta.metrics ?? current.metrics, new Date());
      }
      return update;
    });
  }

  private finish(run: JobRun): void {
    const status = run.job.status === 'completed' ? 'completed' : 'failed';
    this.events.publish(run.jobId, { type: 'end', status });
    log.info(
      { jobId: run.jobId, status, tokens: run.job.metrics.totalTokens, durationMs: run.job.metrics.durationMs },
      'Pipeline finished'
    );
  }

  private async failRun(run: JobRun, error: unknown): Promise<PipelineRunResult> {
    const errorInfo = describeError(error);
    log.error({ jobId: run.jobId, step: run.job.currentStep, err: error }, 'Pipeline failed');

    await this.transition(run, {
      next: 'failed',
      delta: {
        errorInfo,
        logs: [logEntry(run.job.currentStep, 'error', errorInfo)],
      },
    });
    this.finish(run);
    return 'failed';
  }

  /**
   * Apply a delta to the run's snapshot, persist it and publish it.
   * The update function sees the snapshot at call time.
   */
  private async commit(run: JobRun, update: JobDelta | ((job: Job) => JobDelta)): Promise<void> {
    run.throwIfCancelled();

    const delta: JobDelta = {
      ...(typeof update === 'function' ? update(run.job) : update),
      updatedAt: new Date().toISOString(),
    };
    run.job = applyDelta(run.job, delta, this.settings.logLimit);

    const published: JobDelta = { ...delta };
    if (delta.progressPercent !== undefined) {
      published.progressPercent = run.job.progressPercent;
    }

    await this.store.saveJob(run.job);
    run.throwIfCancelled();
    this.events.publish(run.jobId, { type: 'update', delta: published });
  }

  private note(step: PipelineStep, level: JobLogLevel, message: string): JobDelta {
    return { logs: [logEntry(step, level, message)] };
  }

  // ============ Step handlers ============

  private async startRun(_run: JobRun): Promise<StepTransition> {
    return { next: 'chunking', delta: {} };
  }

  private async chunkDocument(run: JobRun): Promise<StepTransition> {
    const { job } = run;
    const next: PipelineStep = job.mode === 'deep' ? 'terminology_unification' : 'translating';

    if (job.chunks.length > 0) {
      return { next, delta: this.note('chunking', 'info', `Reusing ${job.chunks.length} persisted chunks`) };
    }

    const chunks = splitDocument(job.originalContent, this.settings.maxChunkSize);
    log.info({ jobId: job.jobId, chunks: chunks.length }, 'Document chunked');

    return {
      next,
      delta: {
        chunks,
        metrics: {
          ...job.metrics,
          totalChunks: chunks.length,
          sourceWordCount: countWords(job.originalContent),
        },
        ...this.note('chunking', 'info', `Split document into ${chunks.length} chunks`),
      },
    };
  }

  private async unifyTerminology(run: JobRun): Promise<StepTransition> {
    const { job } = run;
    const result = await this.terminologyStage.execute(
      job.originalContent,
      job.userGlossary,
      job.mode,
      job.config,
      run.signal
    );
    run.throwIfCancelled();

    const resolution = result.data;
    const glossary = resolution?.glossary ?? [];
    const message = result.success
      ? `Glossary ready: ${glossary.length} terms (${resolution?.origin ?? 'none'})`
      : (result.error ?? 'Terminology extraction failed');

    return {
      next: 'translating',
      delta: {
        jobGlossary: glossary,
        metrics: addGenerationUsage(run.job.metrics, result.tokensUsed, result.generationCalls),
        ...this.note('terminology_unification', result.success ? 'info' : 'warn', message),
      },
    };
  }

  private async translateChunks(run: JobRun): Promise<StepTransition> {
    const total = run.job.chunks.length;
    const pending = run.job.chunks.filter((chunk) => chunk.status !== 'translated');
    const glossary = new GlossaryManager(run.job.jobGlossary);
    let settled = total - pending.length;

    await this.translateStage.translateAll(pending, glossary, run.job.config, this.pool, {
      signal: run.signal,
      onStart: (chunk) => this.commit(run, { chunks: [{ ...chunk, status: 'translating', error: null }] }),
      onSettled: (outcome) => {
        settled++;
        return this.commit(run, (current) =>
          this.chunkSettledDelta(current, outcome, {
            step: 'translating',
            fraction: settled / total,
            onSuccess: (chunk, text) => ({ ...chunk, translatedText: text, status: 'translated', error: null }),
            onFailure: (chunk, message) => ({ ...chunk, status: 'failed', error: message }),
          })
        );
      },
    });

    const failed = run.job.chunks.filter((chunk) => chunk.status === 'failed');
    if (failed.length > 0) {
      const detail = failed.map((chunk) => `chunk ${chunk.index}: ${chunk.error ?? 'unknown error'}`).join('; ');
      return {
        next: 'failed',
        delta: { errorInfo: `${failed.length} of ${total} chunks failed to translate (${detail})` },
      };
    }

    return { next: run.job.mode === 'deep' ? 'critiquing' : 'assembling', delta: {} };
  }

  private async critiqueTranslation(run: JobRun): Promise<StepTransition> {
    const { job } = run;
    const result = await this.critiqueStage.execute(
      job.chunks,
      new GlossaryManager(job.jobGlossary),
      job.config,
      this.pool,
      run.signal
    );
    run.throwIfCancelled();

    const metrics = addGenerationUsage(run.job.metrics, result.tokensUsed, result.generationCalls);

    if (!result.success || !result.data) {
      const reason = result.error ?? 'Critique failed';
      return {
        next: 'failed',
        delta: {
          critique: { hasCriticalError: true, issues: [reason] },
          errorInfo: `Critique stage failed, treated as a critical error: ${reason}`,
          metrics,
        },
      };
    }

    const critique = result.data;
    if (critique.hasCriticalError) {
      const error = new CriticalQualityError(
        `Critical quality error: ${critique.issues.join('; ') || 'reported without details'}`,
        critique.issues
      );
      return {
        next: 'failed',
        delta: { critique, errorInfo: error.message, finalDocument: null, metrics },
      };
    }

    return {
      next: 'revising',
      delta: {
        critique,
        metrics,
        chunks: job.chunks.map((chunk): Chunk => ({ ...chunk, status: 'critiqued' })),
        ...this.note('critiquing', 'info', `Critique found ${critique.issues.length} document-level issues`),
      },
    };
  }

  private async reviseChunks(run: JobRun): Promise<StepTransition> {
    const { critique } = run.job;
    if (!critique) {
      throw new PipelineError('CRITICAL_QUALITY', 'Revision requires a critique');
    }

    const total = run.job.chunks.length;
    const pending = run.job.chunks.filter((chunk) => chunk.status !== 'refined' && chunk.error === null);
    const glossary = new GlossaryManager(run.job.jobGlossary);
    let settled = total - pending.length;

    await this.reviseStage.reviseAll(pending, critique, glossary, run.job.config, this.pool, {
      signal: run.signal,
      onSettled: (outcome) => {
        settled++;
        return this.commit(run, (current) =>
          this.chunkSettledDelta(current, outcome, {
            step: 'revising',
            fraction: settled / total,
            onSuccess: (chunk, text) => ({ ...chunk, refinedText: text, status: 'refined', error: null }),
            // keep the translation; the chunk stays critiqued
            onFailure: (chunk, message) => ({ ...chunk, status: 'critiqued', error: `Revision failed: ${message}` }),
          })
        );
      },
    });

    const fallbacks = run.job.chunks.filter((chunk) => chunk.status !== 'refined').length;
    return {
      next: 'assembling',
      delta:
        fallbacks > 0
          ? this.note('revising', 'warn', `${fallbacks} chunks kept their unrevised translation`)
          : {},
    };
  }

  private async assembleDocument(run: JobRun): Promise<StepTransition> {
    const finalDocument = assembleChunks(run.job.chunks);
    return {
      next: 'completed',
      delta: {
        finalDocument,
        metrics: { ...run.job.metrics, translatedWordCount: countWords(finalDocument) },
        ...this.note('assembling', 'info', `Assembled ${run.job.chunks.length} chunks`),
      },
    };
  }

  private chunkSettledDelta(
    job: Job,
    outcome: TaskOutcome<Chunk, ChunkGeneration>,
    handling: {
      step: PipelineStep;
      fraction: number;
      onSuccess: (chunk: Chunk, text: string) => Chunk;
      onFailure: (chunk: Chunk, message: string) => Chunk;
    }
  ): JobDelta {
    const chunk = job.chunks.find((c) => c.index === outcome.task.index) ?? outcome.task;
    const progressPercent = progressFor(job.mode, handling.step, handling.fraction);

    if (outcome.ok) {
      const { text, tokensUsed, attempts } = outcome.value;
      return {
        chunks: [{ ...handling.onSuccess(chunk, text), attempts: chunk.attempts + attempts }],
        metrics: addGenerationUsage(job.metrics, tokensUsed, attempts),
        progressPercent,
      };
    }

    const message = describeError(outcome.error);
    const attempts = outcome.error instanceof PipelineError ? (outcome.error.attempts ?? 1) : 1;
    log.warn({ jobId: job.jobId, chunkIndex: chunk.index, step: handling.step, err: outcome.error }, 'Chunk failed');

    return {
      chunks: [{ ...handling.onFailure(chunk, message), attempts: chunk.attempts + attempts }],
      metrics: addGenerationUsage(job.metrics, { prompt: 0, completion: 0, total: 0 }, attempts),
      progressPercent,
      logs: [logEntry(handling.step, 'warn', `Chunk ${chunk.index} failed: ${message}`)],
    };
  }
}
