/**
 * Glossary Manager - keeps one entry per source term and renders
 * terms for prompts
 */

import { z } from 'zod';
import { DEFAULT_TRANSLATION_KEY, type Glossary, type GlossaryTerm } from '../types/glossary.js';

/**
 * External (snake_case) shape of a glossary term, as written by users
 * and by the terminology extraction prompt
 */
export const glossaryTermSchema = z
  .object({
    source_term: z.string().trim().min(1),
    translations: z.record(z.string().trim().min(1)).optional(),
    proposed_translations: z.record(z.string().trim().min(1)).optional(),
  })
  .refine((term) => Object.keys(term.translations ?? term.proposed_translations ?? {}).length > 0, {
    message: 'at least one translation is required',
  })
  .transform(
    (term): GlossaryTerm => ({
      sourceTerm: term.source_term,
      translations: { ...(term.translations ?? term.proposed_translations) },
    })
  );

export function serializeTerm(term: GlossaryTerm): { source_term: string; translations: Record<string, string> } {
  return { source_term: term.sourceTerm, translations: { ...term.translations } };
}

export class GlossaryManager {
  private terms = new Map<string, GlossaryTerm>();

  constructor(terms: Glossary = []) {
    for (const term of terms) {
      this.addTerm(term);
    }
  }

  getTerms(): Glossary {
    return [...this.terms.values()];
  }

  get size(): number {
    return this.terms.size;
  }

  /**
   * Add a term; a later entry for the same source term replaces the earlier one
   */
  addTerm(term: GlossaryTerm): void {
    const key = term.sourceTerm.trim();
    if (key.length === 0) return;

    this.terms.delete(key);
    this.terms.set(key, { sourceTerm: key, translations: { ...term.translations } });
  }

  /**
   * Terms whose source form occurs in `text` (case-insensitive)
   */
  termsForText(text: string): Glossary {
    const haystack = text.toLowerCase();
    return this.getTerms().filter((term) => haystack.includes(term.sourceTerm.toLowerCase()));
  }

  /**
   * Translation for a target language, falling back to the "default" entry
   */
  static translationFor(term: GlossaryTerm, targetLang: string): string | undefined {
    const { translations } = term;
    if (translations[targetLang]) return translations[targetLang];

    const wanted = targetLang.toLowerCase();
    for (const [lang, text] of Object.entries(translations)) {
      if (lang.toLowerCase() === wanted) return text;
    }

    return translations[DEFAULT_TRANSLATION_KEY] ?? Object.values(translations)[0];
  }

  /**
   * Render terms as a prompt list; limited to terms found in `text` when given
   */
  toPromptText(targetLang: string, text?: string): string {
    const terms = text === undefined ? this.getTerms() : this.termsForText(text);

    return terms
      .map((term) => {
        const translation = GlossaryManager.translationFor(term, targetLang);
        return translation ? `- ${term.sourceTerm} → ${translation}` : null;
      })
      .filter((line): line is string => line !== null)
      .join('\n');
  }
}
