/**
 * Shared fixtures: in-memory stores, fast retry policy and app config
 */

import { Memory } from 'lowdb';
import { loadConfig, type AppConfig } from '../config.js';
import {
  createJobRecord,
  type Glossary,
  type GlossarySource,
  type Job,
  type RetryPolicy,
  type TranslationConfig,
} from '../engine/index.js';
import { Database, GlossaryStore, JobStore, type DatabaseSchema } from '../storage/database.js';

export const FAST_RETRY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1,
  maxDelayMs: 1,
  multiplier: 1,
  timeoutMs: 5000,
};

export async function createMemoryDatabase(): Promise<{
  database: Database;
  store: JobStore;
  glossaries: GlossaryStore;
}> {
  const database = new Database(new Memory<DatabaseSchema>());
  await database.read();
  return { database, store: new JobStore(database), glossaries: new GlossaryStore(database) };
}

export function testConfig(overrides: Partial<TranslationConfig> = {}): TranslationConfig {
  return {
    sourceLang: 'en',
    targetLang: 'fr',
    provider: 'openai',
    model: 'test-model',
    targetLanguageAccent: 'professional',
    translationMode: 'quick',
    contentType: 'novel',
    ...overrides,
  };
}

export function makeJob(
  originalContent: string,
  options: {
    jobId?: string;
    config?: Partial<TranslationConfig>;
    userGlossary?: Glossary | null;
    glossarySource?: GlossarySource;
    createdAt?: Date;
  } = {}
): Job {
  return createJobRecord(
    {
      jobId: options.jobId ?? 'job-1',
      config: testConfig(options.config),
      originalContent,
      originalFilename: null,
      glossarySource: options.glossarySource ?? { type: 'none' },
      userGlossary: options.userGlossary ?? null,
    },
    options.createdAt
  );
}

/**
 * App config for service and HTTP tests: an OpenAI key placeholder,
 * small chunks and a fast retry policy
 */
export function testAppConfig(overrides: { maxConcurrentJobs?: number; maxChunkSize?: number } = {}): AppConfig {
  const config = loadConfig({
    NODE_ENV: 'test',
    OPENAI_API_KEY: 'test-key',
    DEFAULT_MODEL: 'test-model',
    MAX_CHUNK_SIZE: String(overrides.maxChunkSize ?? 200),
    MAX_CONCURRENT_JOBS: String(overrides.maxConcurrentJobs ?? 2),
  });
  return {
    ...config,
    pipeline: { ...config.pipeline, retry: FAST_RETRY },
  };
}
