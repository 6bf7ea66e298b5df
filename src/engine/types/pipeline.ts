/**
 * Translation pipeline types
 */

import type { Glossary, GlossarySource } from './glossary.js';
import type { TokenUsage, TranslationConfig, TranslationMode } from './common.js';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export type PipelineStep =
  | 'pending'
  | 'chunking'
  | 'terminology_unification'
  | 'translating'
  | 'critiquing'
  | 'revising'
  | 'assembling'
  | 'completed'
  | 'failed';

export type StageType = 'terminology' | 'translate' | 'critique' | 'revise';

export interface StageResult<T> {
  stage: StageType;
  success: boolean;
  data?: T;
  error?: string;
  tokensUsed: TokenUsage;
  generationCalls: number;
  duration: number; // ms
}

export type ChunkStatus = 'pending' | 'translating' | 'translated' | 'critiqued' | 'refined' | 'failed';

export interface Chunk {
  index: number;
  sourceText: string;
  translatedText: string | null;
  refinedText: string | null;
  status: ChunkStatus;
  error: string | null;
  attempts: number;
}

export interface ChunkIssues {
  index: number;
  issues: string[];
}

export interface Critique {
  hasCriticalError: boolean;
  issues: string[];
  chunkIssues?: ChunkIssues[];
}

export interface JobMetrics {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  generationCalls: number;
  startTime: string | null;
  endTime: string | null;
  durationMs: number | null;
  sourceWordCount: number;
  translatedWordCount: number;
  totalChunks: number;
}

export type JobLogLevel = 'info' | 'warn' | 'error';

export interface JobLogEntry {
  at: string;
  level: JobLogLevel;
  step: PipelineStep;
  message: string;
}

export interface Job {
  jobId: string;
  config: TranslationConfig;
  mode: TranslationMode;
  status: JobStatus;
  currentStep: PipelineStep;
  progressPercent: number;
  originalContent: string;
  originalFilename: string | null;
  glossarySource: GlossarySource;
  userGlossary: Glossary | null;
  jobGlossary: Glossary;
  chunks: Chunk[];
  critique: Critique | null;
  finalDocument: string | null;
  errorInfo: string | null;
  metrics: JobMetrics;
  logs: JobLogEntry[];
  createdAt: string;
  updatedAt: string;
}

/**
 * Partial update of a job. `chunks` holds only the chunks that changed
 * (matched by index), `logs` only newly appended entries.
 */
export interface JobDelta {
  status?: JobStatus;
  currentStep?: PipelineStep;
  progressPercent?: number;
  errorInfo?: string | null;
  jobGlossary?: Glossary;
  critique?: Critique | null;
  finalDocument?: string | null;
  metrics?: JobMetrics;
  chunks?: Chunk[];
  logs?: JobLogEntry[];
  updatedAt?: string;
}

export interface StepTransition {
  next: PipelineStep;
  delta: JobDelta;
}

export interface JobSummary {
  jobId: string;
  status: JobStatus;
  currentStep: PipelineStep;
  progressPercent: number;
  mode: TranslationMode;
  originalFilename: string | null;
  sourceLang: string;
  targetLang: string;
  totalChunks: number;
  errorInfo: string | null;
  createdAt: string;
  updatedAt: string;
}
