/**
 * Prompts for terminology extraction (deep mode without a user glossary)
 */

import type { TranslationConfig } from '../../types/common.js';

export const TERMINOLOGY_SYSTEM_PROMPT = `You are a terminologist preparing a translation glossary.

Read the excerpt and list the recurring names, domain terms and fixed expressions whose translation must stay identical across the whole document.
Skip common words that any translator would render the same way.

## Output Format
Return a JSON object:
{
  "terms": [
    { "source_term": "term as written in the source", "translations": { "<target language>": "proposed translation" } }
  ]
}
Return {"terms": []} when nothing qualifies.`;

export const createTerminologyPrompt = (excerpt: string, config: TranslationConfig): string =>
  `Source language: ${config.sourceLang}
Target language: ${config.targetLang}
Document type: ${config.contentType}

## Excerpt

${excerpt}`;
