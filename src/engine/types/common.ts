/**
 * Common types used across the translation engine
 */

/** Free-form language identifier ("en", "Russian", "pt-BR", ...) */
export type Language = string;

export type TranslationMode = 'quick' | 'deep';

export type ProviderName = 'openai' | 'openrouter' | 'gemini' | 'ollama';

export interface TranslationConfig {
  sourceLang: Language;
  targetLang: Language;
  provider: ProviderName;
  model: string;
  targetLanguageAccent: string; // style directive, e.g. "professional"
  translationMode: TranslationMode;
  contentType: string;
}

export interface TokenUsage {
  prompt: number;
  completion: number;
  total: number;
}

export const EMPTY_USAGE: TokenUsage = { prompt: 0, completion: 0, total: 0 };

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    prompt: a.prompt + b.prompt,
    completion: a.completion + b.completion,
    total: a.total + b.total,
  };
}
