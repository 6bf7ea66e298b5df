/**
 * Prompts for chunk translation
 */

import type { TranslationConfig } from '../../types/common.js';

export const createTranslatorSystemPrompt = (config: TranslationConfig): string =>
  `You are an expert translator working on a long ${config.contentType}, translating from ${config.sourceLang} into ${config.targetLang}.

You receive the document one section at a time. Your translation of each section must:
1. **Preserve meaning**: capture the original intent and nuance, omit nothing, add nothing
2. **Maintain consistency**: use the glossary translations for every listed term
3. **Respect style**: write in a ${config.targetLanguageAccent} register in ${config.targetLang}
4. **Keep structure**: preserve paragraph breaks, headings, list markers, markdown and code blocks exactly

## Output Format
Return ONLY the translated section. No commentary, no notes, no surrounding quotes or code fences.`;

export const createTranslatorPrompt = (sourceText: string, glossary: string): string => {
  let prompt = '';

  if (glossary) {
    prompt += `## Glossary (USE THESE TRANSLATIONS)\n${glossary}\n\n`;
  }

  prompt += `## Text to Translate\n\n${sourceText}\n\n`;
  prompt += `Translate the above text following all guidelines.`;

  return prompt;
};
