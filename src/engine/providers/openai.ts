/**
 * OpenAI-compatible LLM Provider implementation
 *
 * Also serves OpenRouter, Gemini and Ollama through their
 * OpenAI-compatible endpoints.
 */

import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from 'openai';
import type {
  ILLMProvider,
  LLMProviderConfig,
  Message,
  CompletionOptions,
  CompletionResult,
} from '../interfaces/llm-provider.js';
import { GenerationFatalError, GenerationTransientError, JobCancelledError } from '../errors.js';

const FATAL_STATUSES = new Set([400, 401, 403, 404, 422]);

export class OpenAIProvider implements ILLMProvider {
  readonly name: string;
  readonly model: string;

  private client: OpenAI;

  constructor(config: LLMProviderConfig) {
    this.name = config.name;
    this.model = config.model;

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeout ?? 120000,
      // retries are driven by the pipeline's own policy
      maxRetries: 0,
      defaultHeaders: config.defaultHeaders,
    });
  }

  async complete(messages: Message[], options?: CompletionOptions): Promise<CompletionResult> {
    const response = await this.request(messages, options);

    const choice = response.choices[0];
    const content = choice?.message.content ?? '';
    if (!choice || content.trim().length === 0) {
      throw new GenerationTransientError(`${this.name} returned an empty completion`);
    }

    return {
      content,
      tokensUsed: {
        prompt: response.usage?.prompt_tokens ?? 0,
        completion: response.usage?.completion_tokens ?? 0,
        total: response.usage?.total_tokens ?? 0,
      },
      finishReason: this.mapFinishReason(choice.finish_reason),
      model: response.model,
    };
  }

  private async request(messages: Message[], options?: CompletionOptions) {
    try {
      return await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map((m) => ({
            role: m.role,
            content: m.content,
          })),
          temperature: options?.temperature ?? 0.3,
          max_tokens: options?.maxTokens ?? 4096,
          response_format: options?.json ? { type: 'json_object' } : undefined,
        },
        { signal: options?.signal }
      );
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private mapError(error: unknown): Error {
    if (error instanceof APIUserAbortError) {
      return new JobCancelledError();
    }
    if (error instanceof APIConnectionError) {
      return new GenerationTransientError(`${this.name} connection failed: ${error.message}`, {
        cause: error,
      });
    }
    if (error instanceof APIError) {
      const status = error.status;
      if (status !== undefined && FATAL_STATUSES.has(status)) {
        return new GenerationFatalError(`${this.name} rejected the request (${status}): ${error.message}`, {
          cause: error,
          status,
        });
      }
      return new GenerationTransientError(`${this.name} request failed (${status ?? 'no status'}): ${error.message}`, {
        cause: error,
        status,
      });
    }
    if (error instanceof Error) {
      return new GenerationTransientError(error.message, { cause: error });
    }
    return new GenerationTransientError(String(error));
  }

  private mapFinishReason(reason: string | null): CompletionResult['finishReason'] {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'error';
    }
  }
}
