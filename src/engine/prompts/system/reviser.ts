/**
 * Prompts for the revision stage
 */

import type { TranslationConfig } from '../../types/common.js';

export const createReviserSystemPrompt = (config: TranslationConfig): string =>
  `You are an expert editor revising a ${config.sourceLang} → ${config.targetLang} translation of a ${config.contentType}.

Apply the reviewer's findings that concern this section, keep the glossary terms, and polish the text into a ${config.targetLanguageAccent} register.
Do not change anything the findings do not call for beyond fixing clear errors. Preserve paragraph breaks, headings and markdown exactly.

## Output Format
Return ONLY the revised translation of the section. No commentary, no code fences.`;

export const createReviserPrompt = (
  sourceText: string,
  translatedText: string,
  findings: string[],
  glossary: string
): string => {
  let prompt = '';

  if (glossary) {
    prompt += `## Glossary\n${glossary}\n\n`;
  }

  prompt += '## Reviewer Findings\n';
  prompt += findings.length > 0 ? findings.map((f) => `- ${f}`).join('\n') : '- No specific findings; polish only.';
  prompt += '\n\n';

  prompt += `## Original\n\n${sourceText}\n\n`;
  prompt += `## Current Translation\n\n${translatedText}\n\n`;
  prompt += 'Return the revised translation.';

  return prompt;
};
