// ---------------------------------------------------------------------------
// @spatial-text/correction-core: Barrel Export
// ---------------------------------------------------------------------------
// Fuzzy spelling correction for noisy text entry.

export type {
  CorrectionDictionary,
  BigramTable,
  ScoredCandidate,
  TextRange,
  WordSpan,
  ReplacementResult,
  DefaultLexicon,
} from './types.js';

export {
  correctionEngineOptionsSchema,
  correctionDictionarySchema,
  type CorrectionEngineOptions,
  type CorrectionEngineConfig,
} from './config.js';

export { levenshteinDistance, boundedDistance, type DistanceFn } from './levenshtein.js';
export { LruCache } from './lru-cache.js';
export { loadDefaultLexicon, DEFAULT_BIGRAMS } from './lexicon.js';
export { currentWord, replaceWord } from './word-boundary.js';
export { CorrectionEngine, type CorrectionEngineDeps } from './correction-engine.js';
