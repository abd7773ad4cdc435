import type { DiseaseModel, DurationSampler } from "./contracts";
import { RNG, normalFrom, type RandomSource } from "./rng";

export const DEFAULT_DURATION = { mu: 1.2, sigma: 0.5 } as const;

export function lognormalSampler(rng: RandomSource, mu: number = DEFAULT_DURATION.mu, sigma: number = DEFAULT_DURATION.sigma): DurationSampler {
  return () => Math.exp(normalFrom(rng, mu, sigma));
}

export function constantSampler(days: number): DurationSampler {
  return () => days;
}

export interface DiseaseOptions {
  contagiousness: number;
  durationIncubation?: DurationSampler;
  durationSickness?: DurationSampler;
}

/**
 * Frozen disease parameters. Omitted samplers default to a lognormal
 * (mu 1.2, sigma 0.5) fed by `rng`.
 */
export function createDisease(opts: DiseaseOptions, rng: RandomSource = new RNG(0)): DiseaseModel {
  return Object.freeze({
    contagiousness: opts.contagiousness,
    durationIncubation: opts.durationIncubation ?? lognormalSampler(rng),
    durationSickness: opts.durationSickness ?? lognormalSampler(rng)
  });
}

/** Whole days drawn from a sampler. */
export function drawDays(sampler: DurationSampler): number {
  return Math.round(sampler());
}
