/**
 * Translation Service - job submission, admission and lifecycle
 *
 * Jobs are persisted as soon as they are submitted and run in the
 * background through the translation pipeline. At most
 * `maxConcurrentJobs` run at once; the rest wait as `pending` in FIFO order.
 */

import { randomUUID } from 'node:crypto';
import path from 'node:path';
import {
  GlossaryManager,
  JobExistsError,
  createJobRecord,
  type Glossary,
  type GlossarySource,
  type IJobEventHub,
  type IJobStore,
  type ILLMProvider,
  type Job,
  type JobLogEntry,
  type JobSummary,
  type ListJobsOptions,
  type TranslationConfig,
} from '../engine/index.js';
import type { AppConfig } from '../config.js';
import type { GlossaryStore } from '../storage/database.js';
import { createLogger } from '../logger.js';
import { createPipeline, type ProviderFactory } from './engine-integration.js';
import { ConflictError, NotFoundError, ServiceError, ValidationError } from './errors.js';
import type { GlossarySelector, SubmitJobRequest, TranslationConfigInput } from './request-schemas.js';

const log = createLogger('job-service');

export interface TranslationServiceDeps {
  appConfig: AppConfig;
  store: IJobStore;
  glossaries: GlossaryStore;
  events: IJobEventHub;
  providerFactory: ProviderFactory;
}

export interface SubmitResult {
  job: Job;
  glossarySource: GlossarySource;
}

export interface JobResult {
  document: string;
  filename: string;
}

interface ResolvedGlossary {
  source: GlossarySource;
  terms: Glossary | null;
}

export class TranslationService {
  private appConfig: AppConfig;
  private store: IJobStore;
  private glossaries: GlossaryStore;
  private events: IJobEventHub;
  private providerFactory: ProviderFactory;

  private queue: string[] = [];
  private running = new Map<string, AbortController>();
  private runs = new Map<string, Promise<void>>();
  // providers built at submission, handed to the run that picks the job up
  private providers = new Map<string, ILLMProvider>();

  constructor(deps: TranslationServiceDeps) {
    this.appConfig = deps.appConfig;
    this.store = deps.store;
    this.glossaries = deps.glossaries;
    this.events = deps.events;
    this.providerFactory = deps.providerFactory;
  }

  /**
   * Validate and persist a job, then queue it for execution
   */
  async submit(request: SubmitJobRequest): Promise<SubmitResult> {
    const jobId = request.jobId ?? randomUUID();
    if (await this.store.getJob(jobId)) {
      throw new ValidationError(`Job ${jobId} already exists`);
    }

    const config = this.completeConfig(request.config);
    const glossary = await this.resolveGlossary(request.glossary);
    // fails fast on an unknown or unconfigured provider
    const provider = this.providerFactory(config);

    const job = createJobRecord({
      jobId,
      config,
      originalContent: request.originalContent,
      originalFilename: request.originalFilename ?? null,
      glossarySource: glossary.source,
      userGlossary: glossary.terms,
    });
    try {
      await this.store.createJob(job);
    } catch (error) {
      // a concurrent submission took the id after the check above
      if (error instanceof JobExistsError) throw new ValidationError(error.message);
      throw error;
    }
    this.providers.set(jobId, provider);

    log.info(
      { jobId, mode: config.translationMode, provider: config.provider, glossary: glossary.source.type },
      'Job submitted'
    );

    this.enqueue(jobId);
    return { job, glossarySource: glossary.source };
  }

  async getJob(jobId: string): Promise<Job> {
    const job = await this.store.getJob(jobId);
    if (!job) throw new NotFoundError('Job', jobId);
    return job;
  }

  listJobs(options: ListJobsOptions = {}): Promise<JobSummary[]> {
    return this.store.listJobs(options);
  }

  async getLogs(jobId: string): Promise<JobLogEntry[]> {
    const job = await this.getJob(jobId);
    return job.logs;
  }

  async getResult(jobId: string): Promise<JobResult> {
    const job = await this.getJob(jobId);
    if (job.status !== 'completed' || job.finalDocument === null) {
      throw new ConflictError(`Job ${jobId} is ${job.status}, no document to download`);
    }

    return {
      document: job.finalDocument,
      filename: job.originalFilename ? `translated_${path.basename(job.originalFilename)}` : `${jobId}.md`,
    };
  }

  /**
   * Remove a job, stopping it first if it runs. Deleting an unknown job is not an error.
   */
  async deleteJob(jobId: string): Promise<boolean> {
    const controller = this.running.get(jobId);
    controller?.abort();
    this.queue = this.queue.filter((id) => id !== jobId);
    this.providers.delete(jobId);

    const removed = await this.store.deleteJob(jobId);
    if (removed || controller) {
      this.events.publish(jobId, { type: 'end', status: 'deleted' });
      log.info({ jobId, wasRunning: Boolean(controller) }, 'Job deleted');
    }
    return removed;
  }

  /**
   * Re-queue jobs left pending or running by a previous process
   */
  async resumeUnfinishedJobs(): Promise<number> {
    const jobs = await this.store.findUnfinishedJobs();
    for (const job of jobs) {
      if (!this.running.has(job.jobId) && !this.queue.includes(job.jobId)) {
        this.enqueue(job.jobId);
      }
    }
    if (jobs.length > 0) {
      log.info({ count: jobs.length }, 'Resumed unfinished jobs');
    }
    return jobs.length;
  }

  isActive(jobId: string): boolean {
    return this.running.has(jobId) || this.queue.includes(jobId);
  }

  get runningCount(): number {
    return this.running.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Resolves once nothing is running or queued
   */
  async waitForIdle(): Promise<void> {
    while (this.runs.size > 0) {
      await Promise.all(this.runs.values());
    }
  }

  // ============ Internals ============

  private completeConfig(input: TranslationConfigInput): TranslationConfig {
    const { defaults } = this.appConfig;
    const provider = input.provider ?? defaults.provider;
    // the default model belongs to the default provider
    const model = input.model ?? (provider === defaults.provider ? defaults.model : undefined);
    if (!model) {
      throw new ValidationError(`config.model is required for provider "${provider}"`);
    }

    return {
      sourceLang: input.sourceLang,
      targetLang: input.targetLang,
      provider,
      model,
      targetLanguageAccent: input.targetLanguageAccent ?? 'professional',
      translationMode: input.translationMode ?? 'quick',
      contentType: input.contentType ?? 'text',
    };
  }

  private async resolveGlossary(selector: GlossarySelector): Promise<ResolvedGlossary> {
    if (selector === 'none') {
      return { source: { type: 'none' }, terms: null };
    }

    if (selector === 'default') {
      const stored = await this.glossaries.getDefault();
      if (!stored) return { source: { type: 'none' }, terms: null };
      return {
        source: { type: 'default', id: stored.id, name: stored.name, termCount: stored.terms.length },
        terms: stored.terms,
      };
    }

    if ('id' in selector) {
      const stored = await this.glossaries.get(selector.id);
      if (!stored) throw new NotFoundError('Glossary', selector.id);
      return {
        source: { type: 'stored', id: stored.id, name: stored.name, termCount: stored.terms.length },
        terms: stored.terms,
      };
    }

    const terms = new GlossaryManager(selector.terms).getTerms();
    if (terms.length === 0) {
      return { source: { type: 'none' }, terms: null };
    }
    return { source: { type: 'inline', termCount: terms.length }, terms };
  }

  private enqueue(jobId: string): void {
    this.queue.push(jobId);
    this.drain();
  }

  private drain(): void {
    while (this.running.size < this.appConfig.jobs.maxConcurrentJobs && this.queue.length > 0) {
      const jobId = this.queue.shift();
      if (jobId === undefined) break;

      const controller = new AbortController();
      this.running.set(jobId, controller);

      const run = this.execute(jobId, controller.signal)
        .catch((error: unknown) => {
          log.error({ jobId, err: error }, 'Job run stopped');
        })
        .finally(() => {
          this.running.delete(jobId);
          this.runs.delete(jobId);
          this.drain();
        });
      this.runs.set(jobId, run);
    }
  }

  private async execute(jobId: string, signal: AbortSignal): Promise<void> {
    const job = await this.store.getJob(jobId);
    if (!job || signal.aborted) return;

    let provider = this.providers.get(jobId);
    this.providers.delete(jobId);
    if (!provider) {
      try {
        provider = this.providerFactory(job.config);
      } catch (error) {
        if (error instanceof ServiceError) {
          await this.failBeforeStart(job, error.message);
          return;
        }
        throw error;
      }
    }

    const pipeline = createPipeline(this.appConfig, provider, this.store, this.events);
    const result = await pipeline.run(job, signal);
    log.info({ jobId, result }, 'Job run finished');
  }

  /**
   * A resumed job whose provider is no longer configured cannot run at all
   */
  private async failBeforeStart(job: Job, reason: string): Promise<void> {
    const now = new Date().toISOString();
    const errorInfo = `Cannot resume job: ${reason}`;
    await this.store.saveJob({
      ...job,
      status: 'failed',
      currentStep: 'failed',
      errorInfo,
      logs: [...job.logs, { at: now, level: 'error', step: job.currentStep, message: errorInfo }],
      updatedAt: now,
    });
    this.events.publish(job.jobId, { type: 'end', status: 'failed' });
    log.warn({ jobId: job.jobId, reason }, 'Job could not be resumed');
  }
}
