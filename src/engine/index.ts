/**
 * Translation engine - chunked long-document translation pipeline
 *
 * quick: chunk → translate → assemble
 * deep:  chunk → unify terminology → translate → critique → revise → assemble
 *
 * @module engine
 */

// Types
export type { Language, TranslationMode, ProviderName, TranslationConfig, TokenUsage } from './types/common.js';
export type { GlossaryTerm, Glossary, GlossarySource } from './types/glossary.js';
export type {
  JobStatus,
  PipelineStep,
  StageType,
  StageResult,
  ChunkStatus,
  Chunk,
  ChunkIssues,
  Critique,
  JobMetrics,
  JobLogEntry,
  Job,
  JobDelta,
  JobSummary,
  StepTransition,
} from './types/pipeline.js';

// Interfaces
export type {
  ILLMProvider,
  LLMProviderConfig,
  Message,
  CompletionOptions,
  CompletionResult,
} from './interfaces/llm-provider.js';
export type {
  IJobStore,
  IJobEventHub,
  JobEvent,
  JobEventInput,
  JobEventListener,
  JobEndStatus,
  ListJobsOptions,
} from './interfaces/job-store.js';

// Errors
export {
  PipelineError,
  ChunkingError,
  GenerationTransientError,
  GenerationFatalError,
  CriticalQualityError,
  JobExistsError,
  PersistenceError,
  JobCancelledError,
  isRetryableError,
  describeError,
} from './errors.js';

// Providers
export { OpenAIProvider } from './providers/openai.js';

// Glossary
export { GlossaryManager, glossaryTermSchema, serializeTerm } from './glossary/glossary-manager.js';
export { GlossaryResolver, type GlossaryResolution } from './glossary/glossary-resolver.js';

// Pipeline
export {
  TranslationPipeline,
  DEFAULT_PIPELINE_SETTINGS,
  type PipelineConfig,
  type PipelineSettings,
  type PipelineRunResult,
} from './pipeline/translation-pipeline.js';
export { createJobRecord, applyDelta, progressFor, type NewJobInput } from './pipeline/job-state.js';

// Utils
export { splitDocument, assembleChunks, countWords } from './utils/chunker.js';
export { withRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from './utils/retry.js';
export { WorkerPool, type TaskOutcome } from './utils/worker-pool.js';
