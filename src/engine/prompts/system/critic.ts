/**
 * Prompts for the critique stage
 */

import type { TranslationConfig } from '../../types/common.js';

export const CRITIC_SYSTEM_PROMPT = `You are a senior reviewer checking a translation section by section against its source.

Look for:
- Terminology contradictions: a glossary term rendered differently from the glossary, or inconsistently between sections
- Meaning loss: omitted sentences, mistranslations that change the meaning, untranslated passages
- Structure damage: lost headings, paragraphs, lists or code blocks

Set "has_critical_error" to true only for a terminology contradiction or meaning loss serious enough that the translation must not be published.
Stylistic preferences never make an error critical.

## Output Format
Return a JSON object:
{
  "has_critical_error": false,
  "issues": ["finding that concerns the document as a whole"],
  "chunk_issues": [{ "index": 0, "issues": ["finding for that section"] }]
}`;

export interface CritiqueSection {
  index: number;
  source: string;
  translation: string;
}

export const createCritiquePrompt = (
  sections: CritiqueSection[],
  glossary: string,
  config: TranslationConfig
): string => {
  let prompt = `Source language: ${config.sourceLang}\nTarget language: ${config.targetLang}\nExpected register: ${config.targetLanguageAccent}\n\n`;

  if (glossary) {
    prompt += `## Glossary\n${glossary}\n\n`;
  }

  for (const section of sections) {
    prompt += `### Section ${section.index}\n`;
    prompt += `[SOURCE]\n${section.source.trim()}\n\n`;
    prompt += `[TRANSLATION]\n${section.translation.trim()}\n\n`;
  }

  prompt += 'Review the sections above. Use the section numbers for "index".';
  return prompt;
};
