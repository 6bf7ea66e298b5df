/**
 * Glossary types for maintaining terminology consistency
 */

/** Key used for a translation that applies to any target language */
export const DEFAULT_TRANSLATION_KEY = 'default';

export interface GlossaryTerm {
  sourceTerm: string;
  /** target language (or "default") -> proposed translation */
  translations: Record<string, string>;
}

/** Set of terms keyed by unique `sourceTerm`; order carries no meaning */
export type Glossary = GlossaryTerm[];

export type GlossarySource =
  | { type: 'none' }
  | { type: 'default'; id: string; name: string; termCount: number }
  | { type: 'stored'; id: string; name: string; termCount: number }
  | { type: 'inline'; termCount: number };
