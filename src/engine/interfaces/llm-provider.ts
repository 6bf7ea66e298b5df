/**
 * LLM Provider interface - the generation capability the pipeline depends on
 */

import type { TokenUsage } from '../types/common.js';

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the backend for a JSON object response */
  json?: boolean;
  signal?: AbortSignal;
}

export interface CompletionResult {
  content: string;
  tokensUsed: TokenUsage;
  finishReason: 'stop' | 'length' | 'content_filter' | 'error';
  model: string;
}

export interface ILLMProvider {
  readonly name: string;
  readonly model: string;

  /**
   * Send a completion request to the LLM.
   * Rejects with GenerationTransientError or GenerationFatalError.
   */
  complete(messages: Message[], options?: CompletionOptions): Promise<CompletionResult>;
}

export interface LLMProviderConfig {
  name: string;
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeout?: number;
  defaultHeaders?: Record<string, string>;
}
