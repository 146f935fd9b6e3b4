// ---------------------------------------------------------------------------
// @spatial-text/correction-core: Engine Options
// ---------------------------------------------------------------------------

import { z } from 'zod';

const wordListSchema = z.array(z.string());

export const correctionDictionarySchema = z.record(z.string(), wordListSchema);

export const correctionEngineOptionsSchema = z
  .object({
    /** Replaces the bundled dictionary. */
    dictionary: correctionDictionarySchema.optional(),
    /** Replaces the bundled common-word list. */
    commonWords: wordListSchema.optional(),
    bigrams: z.record(z.string(), wordListSchema).optional(),
    maxSuggestions: z.number().int().positive().default(3),
    /** Largest edit distance still offered as a fuzzy match. */
    maxDistance: z.number().int().positive().default(2),
    cacheCapacity: z.number().int().positive().default(100),
    /** `learn` stops creating new keys once the dictionary holds this many. */
    maxDictionarySize: z.number().int().positive().default(10_000),
  })
  .strict();

export type CorrectionEngineOptions = z.input<typeof correctionEngineOptionsSchema>;
export type CorrectionEngineConfig = z.output<typeof correctionEngineOptionsSchema>;
