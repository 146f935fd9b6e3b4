// ---------------------------------------------------------------------------
// Correction Engine
// ---------------------------------------------------------------------------
// suggest(word):
//   1. key = lowercase(word); cache hit → return
//   2. pool = dictionary[key] (preference order)
//          ++ fuzzy(commonWords ∪ dictionary keys), 1 ≤ d ≤ maxDistance,
//             ordered by (d, lexicographic)
//   3. dedupe (first occurrence wins), drop key itself, take maxSuggestions
//   4. cache under key (LRU eviction)

import { createLogger, parseOptions, type Logger } from '@spatial-text/shared';
import {
  correctionEngineOptionsSchema,
  type CorrectionEngineConfig,
  type CorrectionEngineOptions,
} from './config.js';
import { boundedDistance, levenshteinDistance, type DistanceFn } from './levenshtein.js';
import { DEFAULT_BIGRAMS, loadDefaultLexicon } from './lexicon.js';
import { LruCache } from './lru-cache.js';
import type { BigramTable, CorrectionDictionary, ScoredCandidate } from './types.js';

export interface CorrectionEngineDeps {
  /** Replaces the capped Levenshtein distance used for fuzzy matching. */
  distance?: DistanceFn;
  logger?: Logger;
}

function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.word < b.word) return -1;
  if (a.word > b.word) return 1;
  return 0;
}

function normalizeDictionary(source: CorrectionDictionary): Map<string, string[]> {
  const dictionary = new Map<string, string[]>();
  for (const [misspelling, replacements] of Object.entries(source)) {
    const key = misspelling.toLowerCase();
    const entry = dictionary.get(key) ?? [];
    for (const replacement of replacements) {
      const value = replacement.toLowerCase();
      if (value !== key && !entry.includes(value)) entry.push(value);
    }
    dictionary.set(key, entry);
  }
  return dictionary;
}

function normalizeTable(source: BigramTable): Map<string, readonly string[]> {
  return new Map(Object.entries(source).map(([word, next]) => [word.toLowerCase(), [...next]]));
}

export class CorrectionEngine {
  private readonly config: CorrectionEngineConfig;
  private readonly dictionary: Map<string, string[]>;
  private readonly commonWords: readonly string[];
  private readonly bigrams: Map<string, readonly string[]>;
  private readonly cache: LruCache<string, readonly string[]>;
  private readonly distance: DistanceFn;
  private readonly log: Logger;

  /** @throws ConfigurationError when options fail validation */
  constructor(options: CorrectionEngineOptions = {}, deps: CorrectionEngineDeps = {}) {
    this.config = parseOptions(correctionEngineOptionsSchema, options, 'CorrectionEngine');
    this.log = deps.logger ?? createLogger('correction-engine');

    const needsDefaults = !this.config.dictionary || !this.config.commonWords;
    const defaults = needsDefaults ? loadDefaultLexicon() : undefined;

    const words: readonly string[] = this.config.commonWords ?? defaults?.commonWords ?? [];
    this.dictionary = normalizeDictionary(this.config.dictionary ?? defaults?.dictionary ?? {});
    this.commonWords = Array.from(new Set(words.map((w) => w.toLowerCase())));
    this.bigrams = normalizeTable(this.config.bigrams ?? DEFAULT_BIGRAMS);
    this.distance = deps.distance ?? boundedDistance(this.config.maxDistance);
    this.cache = new LruCache<string, readonly string[]>(this.config.cacheCapacity, (word) => {
      this.log.debug('suggestion cache eviction', { word });
    });
  }

  /**
   * Up to `maxSuggestions` replacements for `word`, best first. Empty when
   * nothing qualifies.
   */
  suggest(word: string): string[] {
    const key = word.toLowerCase();
    if (key.trim().length === 0) return [];

    const cached = this.cache.get(key);
    if (cached) return [...cached];

    const suggestions = this.rank(key);
    this.cache.set(key, suggestions);
    this.log.debug('suggestions computed', { word: key, count: suggestions.length });
    return [...suggestions];
  }

  /**
   * Record that `original` was corrected to `correction`. Duplicates are
   * ignored; a new misspelling is only added below `maxDictionarySize`.
   */
  learn(original: string, correction: string): void {
    const key = original.toLowerCase();
    const value = correction.toLowerCase();
    if (key.length === 0 || value.length === 0 || key === value) return;

    const entry = this.dictionary.get(key);
    if (entry) {
      if (entry.includes(value)) return;
      entry.push(value);
      this.cache.delete(key);
      this.log.info('correction learned', { original: key, correction: value });
      return;
    }

    if (this.dictionary.size >= this.config.maxDictionarySize) {
      this.log.warn('dictionary full, correction not learned', {
        original: key,
        correction: value,
        size: this.dictionary.size,
      });
      return;
    }

    this.dictionary.set(key, [value]);
    // A new key is a fuzzy candidate for every cached word.
    this.cache.clear();
    this.log.info('correction learned', { original: key, correction: value, newEntry: true });
  }

  /** 1 − distance / longer length, case-insensitive. */
  confidence(word: string, suggestion: string): number {
    const a = word.toLowerCase();
    const b = suggestion.toLowerCase();
    const longest = Math.max(Array.from(a).length, Array.from(b).length);
    if (longest === 0) return 1;
    return 1 - levenshteinDistance(a, b) / longest;
  }

  /** Likely next words given the words typed so far. */
  contextualSuggestions(previousWords: readonly string[]): string[] {
    const last = previousWords[previousWords.length - 1];
    if (last === undefined) return [];
    return [...(this.bigrams.get(last.toLowerCase()) ?? [])];
  }

  /** Replacements stored for `word`, in preference order. */
  corrections(word: string): readonly string[] {
    return [...(this.dictionary.get(word.toLowerCase()) ?? [])];
  }

  invalidate(word: string): void {
    this.cache.delete(word.toLowerCase());
  }

  clearCache(): void {
    this.cache.clear();
  }

  get dictionarySize(): number {
    return this.dictionary.size;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private rank(key: string): string[] {
    const exact = this.dictionary.get(key) ?? [];
    const seen = new Set<string>([key]);
    const result: string[] = [];

    for (const candidate of [...exact, ...this.fuzzyMatches(key)]) {
      if (seen.has(candidate)) continue;
      seen.add(candidate);
      result.push(candidate);
      if (result.length === this.config.maxSuggestions) break;
    }
    return result;
  }

  private fuzzyMatches(key: string): string[] {
    const { maxDistance } = this.config;
    const scored: ScoredCandidate[] = [];

    const consider = (word: string): void => {
      const distance = this.distance(key, word);
      if (distance > 0 && distance <= maxDistance) scored.push({ word, distance });
    };

    for (const word of this.commonWords) consider(word);
    for (const misspelling of this.dictionary.keys()) consider(misspelling);

    return scored.sort(compareCandidates).map((c) => c.word);
  }
}
