/**
 * Client-facing JSON shapes for jobs (snake_case field names)
 */

import {
  serializeTerm,
  type Chunk,
  type Critique,
  type GlossarySource,
  type Job,
  type JobDelta,
  type JobLogEntry,
  type JobMetrics,
  type JobSummary,
  type TranslationConfig,
} from '../engine/index.js';

export interface ChunkSnapshot {
  index: number;
  source_text: string;
  translated_chunk: string | null;
  refined_text: string | null;
  status: Chunk['status'];
  error: string | null;
}

function serializeChunk(chunk: Chunk): ChunkSnapshot {
  return {
    index: chunk.index,
    source_text: chunk.sourceText,
    translated_chunk: chunk.translatedText,
    refined_text: chunk.refinedText,
    status: chunk.status,
    error: chunk.error,
  };
}

function serializeConfig(config: TranslationConfig) {
  return {
    source_lang: config.sourceLang,
    target_lang: config.targetLang,
    provider: config.provider,
    model: config.model,
    target_language_accent: config.targetLanguageAccent,
    translation_mode: config.translationMode,
    content_type: config.contentType,
  };
}

function serializeCritique(critique: Critique | null) {
  if (!critique) return null;
  return {
    has_critical_error: critique.hasCriticalError,
    issues: critique.issues,
    chunk_issues: critique.chunkIssues ?? [],
  };
}

function serializeMetrics(metrics: JobMetrics) {
  return {
    prompt_tokens: metrics.promptTokens,
    completion_tokens: metrics.completionTokens,
    total_tokens: metrics.totalTokens,
    generation_calls: metrics.generationCalls,
    start_time: metrics.startTime,
    end_time: metrics.endTime,
    duration_ms: metrics.durationMs,
    source_word_count: metrics.sourceWordCount,
    translated_word_count: metrics.translatedWordCount,
    total_chunks: metrics.totalChunks,
  };
}

export function serializeGlossarySource(source: GlossarySource) {
  switch (source.type) {
    case 'none':
      return { type: source.type };
    case 'inline':
      return { type: source.type, term_count: source.termCount };
    case 'default':
    case 'stored':
      return { type: source.type, id: source.id, name: source.name, term_count: source.termCount };
  }
}

export function serializeLogEntry(entry: JobLogEntry) {
  return { at: entry.at, level: entry.level, step: entry.step, message: entry.message };
}

export function serializeJob(job: Job) {
  return {
    job_id: job.jobId,
    status: job.status,
    current_step: job.currentStep,
    progress_percent: job.progressPercent,
    mode: job.mode,
    config: serializeConfig(job.config),
    original_filename: job.originalFilename,
    glossary_source: serializeGlossarySource(job.glossarySource),
    chunks: [...job.chunks].sort((a, b) => a.index - b.index).map(serializeChunk),
    job_glossary: job.jobGlossary.map(serializeTerm),
    critiques: serializeCritique(job.critique),
    final_document: job.finalDocument,
    error_info: job.errorInfo,
    metrics: serializeMetrics(job.metrics),
    created_at: job.createdAt,
    updated_at: job.updatedAt,
  };
}

export type JobSnapshot = ReturnType<typeof serializeJob>;

export function serializeJobSummary(summary: JobSummary) {
  return {
    job_id: summary.jobId,
    status: summary.status,
    current_step: summary.currentStep,
    progress_percent: summary.progressPercent,
    mode: summary.mode,
    original_filename: summary.originalFilename,
    source_lang: summary.sourceLang,
    target_lang: summary.targetLang,
    total_chunks: summary.totalChunks,
    error_info: summary.errorInfo,
    created_at: summary.createdAt,
    updated_at: summary.updatedAt,
  };
}

/**
 * Delta as pushed to stream observers; only the fields present in the delta
 */
export function serializeDelta(delta: JobDelta): Record<string, unknown> {
  const out: Record<string, unknown> = {};

  if (delta.status !== undefined) out.status = delta.status;
  if (delta.currentStep !== undefined) out.current_step = delta.currentStep;
  if (delta.progressPercent !== undefined) out.progress_percent = delta.progressPercent;
  if (delta.errorInfo !== undefined) out.error_info = delta.errorInfo;
  if (delta.jobGlossary !== undefined) out.job_glossary = delta.jobGlossary.map(serializeTerm);
  if (delta.critique !== undefined) out.critiques = serializeCritique(delta.critique);
  if (delta.finalDocument !== undefined) out.final_document = delta.finalDocument;
  if (delta.metrics !== undefined) out.metrics = serializeMetrics(delta.metrics);
  if (delta.chunks !== undefined) {
    out.chunks = [...delta.chunks].sort((a, b) => a.index - b.index).map(serializeChunk);
  }
  if (delta.logs !== undefined) out.logs = delta.logs.map(serializeLogEntry);
  if (delta.updatedAt !== undefined) out.updated_at = delta.updatedAt;

  return out;
}
