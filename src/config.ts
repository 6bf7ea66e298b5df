/**
 * Configuration management
 */

import { z } from 'zod';
import type { PipelineSettings, ProviderName } from './engine/index.js';

const PROVIDER_NAMES = ['openai', 'openrouter', 'gemini', 'ollama'] as const satisfies readonly ProviderName[];

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const intVar = (fallback: number, min = 1) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).optional().default(fallback));

const numberVar = (fallback: number, min: number, max: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().min(min).max(max).optional().default(fallback));

const stringVar = () => z.preprocess(emptyToUndefined, z.string().optional());

const envSchema = z.object({
  NODE_ENV: z.string().optional().default('development'),
  PORT: intVar(3000),
  LOG_LEVEL: z.string().optional().default('info'),
  DATA_DIR: z.string().optional().default('./data'),

  OPENAI_API_KEY: stringVar(),
  OPENAI_BASE_URL: stringVar(),
  OPENROUTER_API_KEY: stringVar(),
  OPENROUTER_BASE_URL: z.string().optional().default('https://openrouter.ai/api/v1'),
  GEMINI_API_KEY: stringVar(),
  GEMINI_BASE_URL: z.string().optional().default('https://generativelanguage.googleapis.com/v1beta/openai/'),
  OLLAMA_BASE_URL: stringVar(),

  DEFAULT_PROVIDER: z.enum(PROVIDER_NAMES).optional().default('openai'),
  DEFAULT_MODEL: z.string().optional().default('gpt-4o-mini'),

  MAX_CHUNK_SIZE: intVar(2000, 200),
  MAX_PARALLEL_WORKERS: intVar(4),
  TRANSLATION_TEMPERATURE: numberVar(0.3, 0, 2),
  TERMINOLOGY_EXCERPT_CHARS: intVar(8000, 500),
  CRITIQUE_BATCH_CHARS: intVar(12000, 1000),
  RETRY_MAX_ATTEMPTS: intVar(3),
  RETRY_INITIAL_DELAY_MS: intVar(1000, 0),
  RETRY_MAX_DELAY_MS: intVar(16000, 0),
  RETRY_MULTIPLIER: numberVar(2, 1, 10),
  GENERATION_TIMEOUT_MS: intVar(120000, 1000),

  MAX_CONCURRENT_JOBS: intVar(2),
  JOB_LOG_LIMIT: intVar(200),
  UPLOAD_MAX_BYTES: intVar(10 * 1024 * 1024),
});

export interface ProviderSettings {
  apiKey?: string;
  baseUrl?: string;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;

  providers: Record<ProviderName, ProviderSettings>;
  defaults: {
    provider: ProviderName;
    model: string;
  };

  pipeline: PipelineSettings;

  jobs: {
    maxConcurrentJobs: number;
    uploadMaxBytes: number;
  };

  storage: {
    dataDir: string;
  };
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const vars = parsed.data;

  return {
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,

    providers: {
      openai: { apiKey: vars.OPENAI_API_KEY, baseUrl: vars.OPENAI_BASE_URL },
      openrouter: { apiKey: vars.OPENROUTER_API_KEY, baseUrl: vars.OPENROUTER_BASE_URL },
      gemini: { apiKey: vars.GEMINI_API_KEY, baseUrl: vars.GEMINI_BASE_URL },
      ollama: { baseUrl: vars.OLLAMA_BASE_URL },
    },
    defaults: {
      provider: vars.DEFAULT_PROVIDER,
      model: vars.DEFAULT_MODEL,
    },

    pipeline: {
      maxChunkSize: vars.MAX_CHUNK_SIZE,
      maxParallelWorkers: vars.MAX_PARALLEL_WORKERS,
      temperature: vars.TRANSLATION_TEMPERATURE,
      terminologyExcerptChars: vars.TERMINOLOGY_EXCERPT_CHARS,
      critiqueBatchChars: vars.CRITIQUE_BATCH_CHARS,
      retry: {
        maxAttempts: vars.RETRY_MAX_ATTEMPTS,
        initialDelayMs: vars.RETRY_INITIAL_DELAY_MS,
        maxDelayMs: vars.RETRY_MAX_DELAY_MS,
        multiplier: vars.RETRY_MULTIPLIER,
        timeoutMs: vars.GENERATION_TIMEOUT_MS,
      },
      logLimit: vars.JOB_LOG_LIMIT,
    },

    jobs: {
      maxConcurrentJobs: vars.MAX_CONCURRENT_JOBS,
      uploadMaxBytes: vars.UPLOAD_MAX_BYTES,
    },

    storage: {
      dataDir: vars.DATA_DIR,
    },
  };
}

/**
 * Whether a provider has what it needs to serve requests
 */
export function isProviderConfigured(config: AppConfig, provider: ProviderName): boolean {
  const settings = config.providers[provider];
  // ollama runs locally without a key
  return provider === 'ollama' ? Boolean(settings.baseUrl) : Boolean(settings.apiKey);
}

export function listProviders(config: AppConfig): { name: ProviderName; configured: boolean; isDefault: boolean }[] {
  return PROVIDER_NAMES.map((name) => ({
    name,
    configured: isProviderConfigured(config, name),
    isDefault: name === config.defaults.provider,
  }));
}

/**
 * Check if AI provider is configured
 */
export function hasAIProvider(config: AppConfig): boolean {
  return PROVIDER_NAMES.some((name) => isProviderConfigured(config, name));
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!hasAIProvider(config)) {
    errors.push('At least one provider must be configured (OPENAI_API_KEY, OPENROUTER_API_KEY, GEMINI_API_KEY or OLLAMA_BASE_URL)');
  }

  if (!isProviderConfigured(config, config.defaults.provider)) {
    errors.push(`Default provider "${config.defaults.provider}" is not configured`);
  }

  if (config.pipeline.retry.maxDelayMs < config.pipeline.retry.initialDelayMs) {
    errors.push('RETRY_MAX_DELAY_MS must not be lower than RETRY_INITIAL_DELAY_MS');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
