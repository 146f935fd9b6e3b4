import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import { ConfigurationError, createLogger, type LogEntry } from '@spatial-text/shared';
import { CorrectionEngine } from '../correction-engine.js';
import { levenshteinDistance } from '../levenshtein.js';

const silent = createLogger('test', { level: 'error', sink: () => {} });

function engine(...args: ConstructorParameters<typeof CorrectionEngine>): CorrectionEngine {
  const [options, deps] = args;
  return new CorrectionEngine(options, { logger: silent, ...deps });
}

// ─── Bundled Lexicon ───────────────────────────────────────────────────────

describe('CorrectionEngine with the bundled lexicon', () => {
  const corrector = engine();

  it('puts the dictionary correction for "teh" first', () => {
    expect(corrector.suggest('teh')).toEqual(['the', 'get', 'her']);
  });

  it('suggests "weird" first for "wierd"', () => {
    expect(corrector.suggest('wierd')).toEqual(['weird', 'were', 'where']);
  });

  it('lowercases the input', () => {
    expect(corrector.suggest('Recieve')).toEqual(['receive']);
  });

  it('offers misspelling keys as fuzzy matches', () => {
    expect(corrector.suggest('recieves')).toEqual(['recieve']);
  });

  it('returns an empty list when nothing is close', () => {
    expect(corrector.suggest('zzzzzz')).toEqual([]);
  });

  it('returns an empty list for blank input', () => {
    expect(corrector.suggest('')).toEqual([]);
    expect(corrector.suggest('   ')).toEqual([]);
  });

  it('omits self-mappings from the bundled dictionary', () => {
    expect(corrector.corrections('exaggerate')).toEqual([]);
    expect(corrector.dictionarySize).toBe(48);
  });
});

// ─── Ranking ───────────────────────────────────────────────────────────────

describe('suggest ranking', () => {
  it('returns only the exact correction when nothing else is near', () => {
    const corrector = engine({ dictionary: { teh: ['the'] }, commonWords: [] });
    expect(corrector.suggest('teh')).toEqual(['the']);
  });

  it('orders fuzzy matches by distance, then alphabetically', () => {
    const corrector = engine({
      dictionary: {},
      commonWords: ['dog', 'hat', 'cart', 'bat', 'cat'],
    });
    expect(corrector.suggest('cat')).toEqual(['bat', 'cart', 'hat']);
  });

  it('honours maxSuggestions', () => {
    const corrector = engine({
      dictionary: {},
      commonWords: ['hat', 'bat', 'cart'],
      maxSuggestions: 1,
    });
    expect(corrector.suggest('cat')).toEqual(['bat']);
  });

  it('honours maxDistance', () => {
    const corrector = engine({ dictionary: {}, commonWords: ['cart', 'carton'], maxDistance: 1 });
    expect(corrector.suggest('cat')).toEqual(['cart']);
  });

  it('deduplicates a correction that is also a fuzzy match', () => {
    const corrector = engine({ dictionary: { wrod: ['word'] }, commonWords: ['word', 'worm'] });
    expect(corrector.suggest('wrod')).toEqual(['word']);
  });

  it('keeps preference order among exact corrections', () => {
    const corrector = engine({ dictionary: { ther: ['there', 'their', 'the'] }, commonWords: [] });
    expect(corrector.suggest('ther')).toEqual(['there', 'their', 'the']);
  });

  it('normalises dictionary case and drops self-mappings', () => {
    const corrector = engine({ dictionary: { TEH: ['The', 'teh'] }, commonWords: ['The'] });
    expect(corrector.corrections('teh')).toEqual(['the']);
    expect(corrector.suggest('TEH')).toEqual(['the']);
  });
});

describe('Property: suggestion invariants', () => {
  const corrector = engine({ cacheCapacity: 1000 });
  const letters = fc.constantFrom(...'abcdefghijklmnopqrstuvwxyzABCDE'.split(''));

  it('never returns more than three, duplicates, or the word itself', () => {
    fc.assert(
      fc.property(fc.stringOf(letters, { minLength: 1, maxLength: 8 }), (word) => {
        const suggestions = corrector.suggest(word);
        return (
          suggestions.length <= 3 &&
          new Set(suggestions).size === suggestions.length &&
          !suggestions.includes(word.toLowerCase())
        );
      }),
      { numRuns: 200 },
    );
  });
});

// ─── Caching ───────────────────────────────────────────────────────────────

describe('suggestion cache', () => {
  it('does not recompute distances on a repeated word', () => {
    const distance = vi.fn(levenshteinDistance);
    const corrector = engine({ dictionary: { teh: ['the'] }, commonWords: ['cat', 'cart'] }, { distance });

    const first = corrector.suggest('cta');
    expect(distance).toHaveBeenCalledTimes(3);

    const second = corrector.suggest('CTA');
    expect(second).toEqual(first);
    expect(distance).toHaveBeenCalledTimes(3);
  });

  it('returns a copy the caller cannot use to corrupt the cache', () => {
    const corrector = engine({ dictionary: { teh: ['the'] }, commonWords: [] });
    corrector.suggest('teh').push('junk');
    expect(corrector.suggest('teh')).toEqual(['the']);
  });

  it('evicts the least recently used word at capacity', () => {
    const distance = vi.fn(levenshteinDistance);
    const corrector = engine({ dictionary: {}, commonWords: ['cat', 'dog'], cacheCapacity: 2 }, { distance });

    corrector.suggest('cot');
    corrector.suggest('dot');
    corrector.suggest('cot');
    corrector.suggest('cut');
    expect(distance).toHaveBeenCalledTimes(6);
    expect(corrector.cacheSize).toBe(2);

    corrector.suggest('cot');
    expect(distance).toHaveBeenCalledTimes(6);

    corrector.suggest('dot');
    expect(distance).toHaveBeenCalledTimes(8);
  });

  it('invalidate and clearCache force recomputation', () => {
    const distance = vi.fn(levenshteinDistance);
    const corrector = engine({ dictionary: {}, commonWords: ['cat'] }, { distance });

    corrector.suggest('bat');
    corrector.invalidate('BAT');
    corrector.suggest('bat');
    expect(distance).toHaveBeenCalledTimes(2);

    corrector.clearCache();
    expect(corrector.cacheSize).toBe(0);
    corrector.suggest('bat');
    expect(distance).toHaveBeenCalledTimes(3);
  });
});

// ─── Learning ──────────────────────────────────────────────────────────────

describe('learn', () => {
  it('appends to an existing entry and refreshes its cached suggestions', () => {
    const corrector = engine({ dictionary: { teh: ['the'] }, commonWords: [] });
    expect(corrector.suggest('teh')).toEqual(['the']);

    corrector.learn('Teh', 'THEE');

    expect(corrector.corrections('teh')).toEqual(['the', 'thee']);
    expect(corrector.suggest('teh')).toEqual(['the', 'thee']);
  });

  it('is idempotent', () => {
    const corrector = engine({ dictionary: { teh: ['the'] }, commonWords: [] });
    corrector.learn('teh', 'THE');
    corrector.learn('teh', 'thee');
    corrector.learn('teh', 'thee');
    expect(corrector.corrections('teh')).toEqual(['the', 'thee']);
  });

  it('ignores a correction equal to the original', () => {
    const corrector = engine({ dictionary: {}, commonWords: [] });
    corrector.learn('Same', 'same');
    expect(corrector.dictionarySize).toBe(0);
  });

  it('creates a new entry and clears every cached word', () => {
    const corrector = engine({ dictionary: { teh: ['the'] }, commonWords: [] });
    expect(corrector.suggest('tey')).toEqual(['teh']);

    corrector.learn('tex', 'text');

    expect(corrector.dictionarySize).toBe(2);
    expect(corrector.suggest('tey')).toEqual(['teh', 'tex']);
    expect(corrector.suggest('tex')).toEqual(['text', 'teh']);
  });

  it('stops adding keys at maxDictionarySize', () => {
    const corrector = engine({ dictionary: { teh: ['the'] }, commonWords: [], maxDictionarySize: 1 });

    corrector.learn('adn', 'and');
    corrector.learn('teh', 'thee');

    expect(corrector.dictionarySize).toBe(1);
    expect(corrector.suggest('adn')).toEqual([]);
    expect(corrector.corrections('teh')).toEqual(['the', 'thee']);
  });

  it('logs learned corrections and refusals', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger('correction', { level: 'info', sink: (e) => entries.push(e) });
    const corrector = new CorrectionEngine(
      { dictionary: { teh: ['the'] }, commonWords: [], maxDictionarySize: 1 },
      { logger },
    );

    corrector.learn('teh', 'thee');
    corrector.learn('adn', 'and');

    expect(entries.map((e) => [e.level, e.msg])).toEqual([
      ['info', 'correction learned'],
      ['warn', 'dictionary full, correction not learned'],
    ]);
    expect(entries[0]).toMatchObject({ original: 'teh', correction: 'thee' });
  });
});

// ─── Confidence & Context ──────────────────────────────────────────────────

describe('confidence', () => {
  const corrector = engine({ dictionary: {}, commonWords: [] });

  it('is 1 - distance / longer length', () => {
    expect(corrector.confidence('teh', 'the')).toBeCloseTo(1 / 3, 10);
    expect(corrector.confidence('recieve', 'receive')).toBeCloseTo(5 / 7, 10);
    expect(corrector.confidence('cat', 'carton')).toBeCloseTo(0.5, 10);
  });

  it('is case-insensitive', () => {
    expect(corrector.confidence('Cat', 'cAT')).toBe(1);
  });

  it('stays within [0, 1]', () => {
    expect(corrector.confidence('abc', 'xyz')).toBe(0);
    expect(corrector.confidence('', '')).toBe(1);
    expect(corrector.confidence('', 'abc')).toBe(0);
  });
});

describe('contextualSuggestions', () => {
  it('follows the last previous word', () => {
    const corrector = engine({ dictionary: {}, commonWords: [] });
    expect(corrector.contextualSuggestions(['see', 'The'])).toEqual(['quick', 'big', 'small', 'best']);
    expect(corrector.contextualSuggestions(['I'])).toEqual(['am', 'have', 'think', 'want']);
    expect(corrector.contextualSuggestions(['the', 'dog'])).toEqual([]);
    expect(corrector.contextualSuggestions([])).toEqual([]);
  });

  it('accepts a custom bigram table', () => {
    const corrector = engine({ dictionary: {}, commonWords: [], bigrams: { thank: ['you'] } });
    expect(corrector.contextualSuggestions(['Thank'])).toEqual(['you']);
    expect(corrector.contextualSuggestions(['the'])).toEqual([]);
  });
});

// ─── Configuration ─────────────────────────────────────────────────────────

describe('configuration', () => {
  it.each([
    [{ cacheCapacity: 0 }],
    [{ maxSuggestions: -1 }],
    [{ maxDistance: 1.5 }],
    [{ maxDictionarySize: 0 }],
  ])('rejects %j at construction', (options) => {
    expect(() => new CorrectionEngine(options, { logger: silent })).toThrow(ConfigurationError);
  });

  it('rejects unknown options', () => {
    const misspelt = { maxSuggestions: 3, cacheSize: 10 };
    expect(() => new CorrectionEngine(misspelt, { logger: silent })).toThrow(
      ConfigurationError,
    );
  });
});
