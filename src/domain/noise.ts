import seedrandom from 'seedrandom';
import type { BlendComparison, CurveKey, CurveSet, PerformanceSeries, ReportData } from './types';

export const DEFAULT_NOISE_FRACTION = 0.02;
export const DEFAULT_NOISE_SEED = 1;

/** Draws one standard normal sample per call. */
export type NormalSampler = () => number;

export interface NoiseOptions {
  fraction: number;
  seed: number;
}

/**
 * Curves are perturbed in this order, E10 before E20 within each curve, RPM
 * ascending within each array. Changing it changes every seeded output.
 */
export const NOISE_DRAW_ORDER: readonly CurveKey[] = [
  'brakePowerKw',
  'torqueNm',
  'bsfcKgPerKwh',
  'thermalEfficiency',
];

export function createNormalSampler(seed: number): NormalSampler {
  const rng = seedrandom(String(seed));
  return () => {
    // Box-Muller, cosine branch. 1 - u keeps the log argument in (0, 1].
    const u1 = 1 - rng();
    const u2 = rng();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  };
}

export function perturbValues(values: readonly number[], fraction: number, sampler: NormalSampler): number[] {
  return values.map((v) => v * (1 + fraction * sampler()));
}

export function toCurveSet(series: PerformanceSeries): CurveSet {
  return {
    fuel: series.fuel,
    brakePowerKw: series.points.map((p) => p.brakePowerKw),
    torqueNm: series.points.map((p) => p.torqueNm),
    bsfcKgPerKwh: series.points.map((p) => p.bsfcKgPerKwh),
    thermalEfficiency: series.points.map((p) => p.thermalEfficiency),
  };
}

/**
 * Emulates dyno scatter with multiplicative Gaussian noise. Results are not
 * clamped, so an efficiency can land outside its physical range.
 */
export class NoiseInjector {
  private readonly fraction: number;
  private readonly sampler: NormalSampler;

  constructor(options: NoiseOptions, sampler?: NormalSampler) {
    this.fraction = options.fraction;
    this.sampler = sampler ?? createNormalSampler(options.seed);
  }

  apply(comparison: BlendComparison): ReportData {
    const a = toCurveSet(comparison.series[0]);
    const b = toCurveSet(comparison.series[1]);

    for (const key of NOISE_DRAW_ORDER) {
      a[key] = perturbValues(a[key], this.fraction, this.sampler);
      b[key] = perturbValues(b[key], this.fraction, this.sampler);
    }

    return { rpm: [...comparison.rpm], curves: [a, b] };
  }
}
