/**
 * Pure helpers over the job snapshot: creation, delta application,
 * progress weights and metric accounting
 */

import type { TokenUsage, TranslationConfig, TranslationMode } from '../types/common.js';
import type { Glossary, GlossarySource } from '../types/glossary.js';
import type {
  Chunk,
  Job,
  JobDelta,
  JobLogEntry,
  JobLogLevel,
  JobMetrics,
  PipelineStep,
} from '../types/pipeline.js';

export type WeightedStep = Extract<
  PipelineStep,
  'chunking' | 'terminology_unification' | 'translating' | 'critiquing' | 'revising' | 'assembling'
>;

export const STEP_WEIGHTS: Record<WeightedStep, number> = {
  chunking: 5,
  terminology_unification: 5,
  translating: 45,
  critiquing: 10,
  revising: 25,
  assembling: 10,
};

export const MODE_STEPS: Record<TranslationMode, readonly WeightedStep[]> = {
  quick: ['chunking', 'translating', 'assembling'],
  deep: ['chunking', 'terminology_unification', 'translating', 'critiquing', 'revising', 'assembling'],
};

export const TERMINAL_STEPS: ReadonlySet<PipelineStep> = new Set(['completed', 'failed']);

export function isWeightedStep(step: PipelineStep): step is WeightedStep {
  return step in STEP_WEIGHTS;
}

/**
 * Overall progress when `fraction` of `step` is done. Weights are normalised
 * over the steps the mode runs, so both modes end at 100.
 */
export function progressFor(mode: TranslationMode, step: PipelineStep, fraction = 0): number {
  if (step === 'completed') return 100;
  if (!isWeightedStep(step)) return 0;

  const steps = MODE_STEPS[mode];
  const position = steps.indexOf(step);
  if (position === -1) return 0;

  const total = steps.reduce((sum, s) => sum + STEP_WEIGHTS[s], 0);
  const done = steps.slice(0, position).reduce((sum, s) => sum + STEP_WEIGHTS[s], 0);
  const clamped = Math.min(Math.max(fraction, 0), 1);

  // floor keeps anything short of completion below 100
  return Math.min(99, Math.floor(((done + STEP_WEIGHTS[step] * clamped) / total) * 100));
}

export function emptyMetrics(): JobMetrics {
  return {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    generationCalls: 0,
    startTime: null,
    endTime: null,
    durationMs: null,
    sourceWordCount: 0,
    translatedWordCount: 0,
    totalChunks: 0,
  };
}

export function addGenerationUsage(metrics: JobMetrics, usage: TokenUsage, calls: number): JobMetrics {
  return {
    ...metrics,
    promptTokens: metrics.promptTokens + usage.prompt,
    completionTokens: metrics.completionTokens + usage.completion,
    totalTokens: metrics.totalTokens + usage.total,
    generationCalls: metrics.generationCalls + calls,
  };
}

export function finishMetrics(metrics: JobMetrics, now: Date): JobMetrics {
  const started = metrics.startTime ? Date.parse(metrics.startTime) : now.getTime();
  return {
    ...metrics,
    endTime: now.toISOString(),
    durationMs: Math.max(0, now.getTime() - started),
  };
}

export interface NewJobInput {
  jobId: string;
  config: TranslationConfig;
  originalContent: string;
  originalFilename: string | null;
  glossarySource: GlossarySource;
  userGlossary: Glossary | null;
}

export function createJobRecord(input: NewJobInput, now = new Date()): Job {
  const timestamp = now.toISOString();
  return {
    jobId: input.jobId,
    config: input.config,
    mode: input.config.translationMode,
    status: 'pending',
    currentStep: 'pending',
    progressPercent: 0,
    originalContent: input.originalContent,
    originalFilename: input.originalFilename,
    glossarySource: input.glossarySource,
    userGlossary: input.userGlossary,
    jobGlossary: [],
    chunks: [],
    critique: null,
    finalDocument: null,
    errorInfo: null,
    metrics: emptyMetrics(),
    logs: [],
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export function logEntry(step: PipelineStep, level: JobLogLevel, message: string, now = new Date()): JobLogEntry {
  return { at: now.toISOString(), level, step, message };
}

function mergeChunks(current: readonly Chunk[], changed: readonly Chunk[]): Chunk[] {
  const byIndex = new Map(current.map((chunk) => [chunk.index, chunk]));
  for (const chunk of changed) {
    byIndex.set(chunk.index, chunk);
  }
  return [...byIndex.values()].sort((a, b) => a.index - b.index);
}

/**
 * Apply a delta to a job, returning a new snapshot. Progress never moves
 * backwards and the log keeps only the newest `logLimit` entries.
 */
export function applyDelta(job: Job, delta: JobDelta, logLimit = Number.POSITIVE_INFINITY): Job {
  const { chunks, logs, progressPercent, ...fields } = delta;

  const next: Job = { ...job, ...fields };
  if (chunks) {
    next.chunks = mergeChunks(job.chunks, chunks);
  }
  if (logs && logs.length > 0) {
    const combined = [...job.logs, ...logs];
    next.logs = combined.length > logLimit ? combined.slice(combined.length - logLimit) : combined;
  }
  if (progressPercent !== undefined) {
    next.progressPercent = Math.max(job.progressPercent, progressPercent);
  }
  return next;
}
