// ---------------------------------------------------------------------------
// Word Boundaries
// ---------------------------------------------------------------------------
// Locate the word under a text cursor and splice a suggestion back in.
// A boundary is any whitespace or Unicode punctuation character.

import type { ReplacementResult, TextRange, WordSpan } from './types.js';

const BOUNDARY = /[\s\p{P}]/u;

function isBoundary(ch: string | undefined): boolean {
  return ch === undefined || BOUNDARY.test(ch);
}

/**
 * Word touching `cursor`, expanded both ways to the nearest boundary.
 * Returns null for empty text or when the cursor sits between boundaries.
 */
export function currentWord(text: string, cursor: number): WordSpan | null {
  if (text.length === 0) return null;
  const at = Math.max(0, Math.min(text.length, Math.trunc(cursor)));

  let start = at;
  while (start > 0 && !isBoundary(text[start - 1])) start--;

  let end = at;
  while (end < text.length && !isBoundary(text[end])) end++;

  if (end === start) return null;
  return { word: text.slice(start, end), start, end };
}

/** Replace `range` with `replacement` and place the cursor after it. */
export function replaceWord(text: string, range: TextRange, replacement: string): ReplacementResult {
  const start = Math.max(0, Math.min(text.length, range.start));
  const end = Math.max(start, Math.min(text.length, range.end));
  return {
    text: text.slice(0, start) + replacement + text.slice(end),
    cursor: start + replacement.length,
  };
}
