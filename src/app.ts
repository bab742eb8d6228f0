import type { BlendComparison, EngineGeometry, FuelProperties, ReportData } from './domain/types';
import { computeBlendComparison, sweptVolume } from './domain/engine-model';
import { NoiseInjector } from './domain/noise';
import type { NormalSampler } from './domain/noise';
import { buildRpmSweep, createEngineGeometry } from './domain/parameters';
import { summarizeReport } from './domain/summary';
import type { BlendSummary } from './domain/summary';
import { getBlendPair } from './data/fuel-loader';
import type { RunConfig } from './config';
import type { Logger } from './logger';
import { FigureExporter } from './report/exporter';
import type { ExportedFile, ReportExporter } from './report/exporter';

export interface RunResult {
  comparison: BlendComparison;
  report: ReportData;
  summaries: BlendSummary[];
  files: ExportedFile[];
}

export interface RunDependencies {
  logger: Logger;
  exporter?: ReportExporter;
  fuels?: [FuelProperties, FuelProperties];
  /** Replaces the seeded generator, e.g. to pin every draw in a test. */
  sampler?: NormalSampler;
}

function logClamping(comparison: BlendComparison, log: Logger): void {
  for (const series of comparison.series) {
    for (const p of series.points) {
      if (p.veClamped) {
        log.debug('volumetric efficiency at floor', { fuel: series.fuel.id, rpm: p.rpm, ve: p.volumetricEfficiency });
      }
      if (p.etaClamped) {
        log.debug('thermal efficiency at floor', { fuel: series.fuel.id, rpm: p.rpm, eta: p.thermalEfficiency });
      }
    }
  }
}

/** Model only, no noise and no export. */
export function computeComparison(
  geometry: EngineGeometry,
  sweep: RunConfig['sweep'],
  fuels: [FuelProperties, FuelProperties] = getBlendPair(),
): BlendComparison {
  return computeBlendComparison(createEngineGeometry(geometry), fuels, buildRpmSweep(sweep));
}

/**
 * One run: parameters → model → noise → export. All state, the noise
 * generator included, lives for the duration of this call.
 */
export async function runAnalysis(config: RunConfig, deps: RunDependencies): Promise<RunResult> {
  const log = deps.logger.child('run');
  const fuels = deps.fuels ?? getBlendPair();

  log.info('computing performance curves', {
    geometry: config.geometry,
    sweptVolumeM3: sweptVolume(config.geometry),
    sweep: config.sweep,
    fuels: fuels.map((f) => f.id),
  });
  const comparison = computeComparison(config.geometry, config.sweep, fuels);
  logClamping(comparison, log);

  const injector = new NoiseInjector(config.noise, deps.sampler);
  const report = injector.apply(comparison);
  log.info('noise applied', { fraction: config.noise.fraction, seed: config.noise.seed, points: report.rpm.length });

  const summaries = summarizeReport(report);

  const exporter = deps.exporter ?? new FigureExporter(config.output, deps.logger);
  const files = await exporter.export(report);

  return { comparison, report, summaries, files };
}
