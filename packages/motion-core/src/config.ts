// ---------------------------------------------------------------------------
// @spatial-text/motion-core: Smoother Options
// ---------------------------------------------------------------------------

import { z } from 'zod';

export const vec3Schema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

export const smootherOptionsSchema = z
  .object({
    /** Exponential smoothing weight of each new estimate (alpha). */
    smoothingFactor: z.number().gt(0).lte(1).default(0.15),
    /** Fixed extrapolation horizon applied to velocity in the predict step. */
    predictionFactor: z.number().min(0).default(0.3),
    /** Added to both uncertainties per sample; higher reacts faster. */
    processNoise: z.number().min(0).default(0.1),
    /** Trust in raw samples; lower follows them more closely. */
    measurementNoise: z.number().positive().default(0.5),
    /** Total variance of recent samples below which the gaze is stable. */
    stabilityThreshold: z.number().positive().default(0.01),
    historyCapacity: z.number().int().positive().default(10),
    initialPosition: vec3Schema.default({ x: 0, y: 0, z: -0.5 }),
    initialUncertainty: z.number().min(0).default(1),
    /** Pick alpha from the movement band instead of `smoothingFactor` alone. */
    adaptiveSmoothing: z.boolean().default(false),
  })
  .strict();

export type SmootherOptions = z.input<typeof smootherOptionsSchema>;
export type SmootherConfig = z.output<typeof smootherOptionsSchema>;
