/**
 * Engine Integration - builds providers and pipelines from app configuration
 */

import {
  OpenAIProvider,
  TranslationPipeline,
  type IJobEventHub,
  type IJobStore,
  type ILLMProvider,
  type TranslationConfig,
} from '../engine/index.js';
import { isProviderConfigured, type AppConfig } from '../config.js';
import { ValidationError } from './errors.js';

export type ProviderFactory = (config: TranslationConfig) => ILLMProvider;

/**
 * Create the generation provider a job config asks for
 */
export function createProvider(appConfig: AppConfig, config: TranslationConfig): ILLMProvider {
  const { provider, model } = config;
  if (!isProviderConfigured(appConfig, provider)) {
    throw new ValidationError(`Provider "${provider}" is not configured`);
  }

  const settings = appConfig.providers[provider];
  return new OpenAIProvider({
    name: provider,
    model,
    // ollama accepts any key
    apiKey: settings.apiKey ?? 'ollama',
    baseUrl: settings.baseUrl,
    timeout: appConfig.pipeline.retry.timeoutMs,
  });
}

export function createProviderFactory(appConfig: AppConfig): ProviderFactory {
  return (config) => createProvider(appConfig, config);
}

/**
 * Create translation pipeline for a job
 */
export function createPipeline(
  appConfig: AppConfig,
  provider: ILLMProvider,
  store: IJobStore,
  events: IJobEventHub
): TranslationPipeline {
  return new TranslationPipeline({
    provider,
    store,
    events,
    settings: appConfig.pipeline,
  });
}
