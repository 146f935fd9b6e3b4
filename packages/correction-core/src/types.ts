// ---------------------------------------------------------------------------
// @spatial-text/correction-core: Types
// ---------------------------------------------------------------------------

/** Lowercase misspelling → replacements in order of preference. */
export type CorrectionDictionary = Record<string, readonly string[]>;

/** Previous word (lowercase) → words likely to follow it. */
export type BigramTable = Record<string, readonly string[]>;

export interface ScoredCandidate {
  word: string;
  distance: number;
}

/** Half-open range of UTF-16 offsets into a text buffer. */
export interface TextRange {
  start: number;
  end: number;
}

export interface WordSpan extends TextRange {
  word: string;
}

export interface ReplacementResult {
  text: string;
  /** Cursor offset just after the inserted replacement. */
  cursor: number;
}

export interface DefaultLexicon {
  dictionary: CorrectionDictionary;
  commonWords: readonly string[];
}
