// ---------------------------------------------------------------------------
// @spatial-text/correction-core: Bundled Lexicon
// ---------------------------------------------------------------------------
// Common misspellings and a short common-word list, shipped as JSON under
// data/ and read once on first use.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { parseOptions } from '@spatial-text/shared';
import { correctionDictionarySchema } from './config.js';
import type { BigramTable, DefaultLexicon } from './types.js';

export const DEFAULT_BIGRAMS: BigramTable = {
  the: ['quick', 'big', 'small', 'best'],
  i: ['am', 'have', 'think', 'want'],
};

let lexicon: DefaultLexicon | undefined;

function readDataFile(name: string): unknown {
  const url = new URL(`../data/${name}`, import.meta.url);
  return JSON.parse(readFileSync(url, 'utf8'));
}

export function loadDefaultLexicon(): DefaultLexicon {
  if (lexicon) return lexicon;
  lexicon = {
    dictionary: parseOptions(correctionDictionarySchema, readDataFile('corrections.json'), 'lexicon'),
    commonWords: parseOptions(z.array(z.string()), readDataFile('common-words.json'), 'lexicon'),
  };
  return lexicon;
}
