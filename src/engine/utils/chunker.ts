/**
 * Text Chunker - Splits a document into ordered chunks for generation calls
 *
 * Splitting is lossless: every character of the input, separators included,
 * lands in exactly one chunk, so joining `sourceText` in index order gives
 * back the original document.
 */

import type { Chunk } from '../types/pipeline.js';
import { ChunkingError } from '../errors.js';

const FENCE_PATTERN = /^(```|~~~)/;
const HEADING_PATTERN = /^#{1,6}\s/;

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

/** Length that counts against the chunk limit: trailing whitespace is free */
function contentLength(text: string): number {
  return text.trimEnd().length;
}

/**
 * Split text into structural units (paragraphs and headings).
 * Each unit keeps the blank lines that follow it.
 */
function splitIntoUnits(text: string): string[] {
  const lines = text.split(/(?<=\n)/);
  const units: string[] = [];

  let current = '';
  let inFence = false;
  let pendingBreak = false;

  for (const line of lines) {
    const trimmed = line.trim();
    const isFence = FENCE_PATTERN.test(trimmed);

    if (!inFence) {
      if (trimmed === '') {
        current += line;
        pendingBreak = true;
        continue;
      }

      const isHeading = HEADING_PATTERN.test(trimmed);
      if ((pendingBreak || isHeading) && current.trim() !== '') {
        units.push(current);
        current = '';
      }
      pendingBreak = false;
    }

    current += line;
    if (isFence) {
      inFence = !inFence;
    }
  }

  if (current !== '') {
    units.push(current);
  }

  return units;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Last match end of `pattern` inside `window`, or 0 */
function lastBoundary(window: string, pattern: RegExp): number {
  let cut = 0;
  for (const match of window.matchAll(pattern)) {
    if (match.index !== undefined) {
      cut = match.index + match[0].length;
    }
  }
  return cut;
}

/**
 * Hard-split a unit that exceeds the limit.
 * Prefers a line break, then a sentence end, then a word boundary.
 */
function hardSplit(unit: string, maxChunkSize: number): string[] {
  const pieces: string[] = [];
  let remaining = unit;

  while (contentLength(remaining) > maxChunkSize) {
    const window = remaining.slice(0, maxChunkSize);

    let cut = lastBoundary(window, /\S[ \t]*\r?\n\s*/g);
    if (cut === 0) cut = lastBoundary(window, /[.!?…。！？]["'”’»)\]]*\s+/g);
    if (cut === 0) cut = lastBoundary(window, /\S\s+/g);
    if (cut === 0) {
      cut = maxChunkSize;
      // never separate a surrogate pair; a limit of 1 takes the whole pair
      if (isHighSurrogate(remaining.charCodeAt(cut - 1))) {
        cut = cut > 1 ? cut - 1 : cut + 1;
      }
    }

    pieces.push(remaining.slice(0, cut));
    remaining = remaining.slice(cut);
  }

  if (remaining !== '') {
    if (remaining.trim() === '' && pieces.length > 0) {
      pieces[pieces.length - 1] += remaining;
    } else {
      pieces.push(remaining);
    }
  }

  return pieces;
}

function createChunk(sourceText: string, index: number): Chunk {
  return {
    index,
    sourceText,
    translatedText: null,
    refinedText: null,
    status: 'pending',
    error: null,
    attempts: 0,
  };
}

/**
 * Split a document into chunks of at most `maxChunkSize` characters,
 * preferring paragraph and heading boundaries.
 */
export function splitDocument(document: string, maxChunkSize: number): Chunk[] {
  if (document.trim().length === 0) {
    throw new ChunkingError('Document is empty');
  }
  if (!Number.isInteger(maxChunkSize) || maxChunkSize < 1) {
    throw new ChunkingError(`Invalid max chunk size: ${maxChunkSize}`);
  }

  const texts: string[] = [];
  let current = '';

  for (const unit of splitIntoUnits(document)) {
    if (contentLength(unit) > maxChunkSize) {
      if (current !== '') {
        texts.push(current);
        current = '';
      }
      texts.push(...hardSplit(unit, maxChunkSize));
      continue;
    }

    if (current !== '' && contentLength(current + unit) > maxChunkSize) {
      texts.push(current);
      current = '';
    }
    current += unit;
  }

  if (current !== '') {
    texts.push(current);
  }

  return texts.map((text, index) => createChunk(text, index));
}

/**
 * Separate leading and trailing whitespace from the text a model should see
 */
export function splitBoundaryWhitespace(text: string): {
  leading: string;
  core: string;
  trailing: string;
} {
  const leading = /^\s*/.exec(text)?.[0] ?? '';
  const core = text.trim();
  const trailing = core.length === 0 ? '' : (/\s*$/.exec(text)?.[0] ?? '');
  return { leading, core, trailing };
}

/**
 * Wrap generated text in the whitespace that surrounded its source chunk,
 * so chunk separators survive translation.
 */
export function restoreBoundaryWhitespace(source: string, output: string): string {
  const { leading, trailing } = splitBoundaryWhitespace(source);
  return `${leading}${output.trim()}${trailing}`;
}

/**
 * Assemble the final document from chunks in index order,
 * using refined text where a revision exists.
 */
export function assembleChunks(chunks: readonly Chunk[]): string {
  const sorted = [...chunks].sort((a, b) => a.index - b.index);

  return sorted
    .map((chunk) => {
      const text = chunk.refinedText ?? chunk.translatedText;
      if (text === null) {
        throw new Error(`Chunk ${chunk.index} has no translation to assemble`);
      }
      return text;
    })
    .join('');
}
