import { describe, it, expect } from 'vitest';
import { computeComparison, runAnalysis } from './app';
import { defaultRunConfig, mergeRunConfig } from './config';
import { toCurveSet } from './domain/noise';
import { InvalidParameterError } from './domain/errors';
import { Logger } from './logger';
import type { LogEntry } from './logger';
import type { ExportedFile, ReportExporter } from './report/exporter';
import type { ReportData } from './domain/types';

class MemoryExporter implements ReportExporter {
  received: ReportData[] = [];

  async export(data: ReportData): Promise<ExportedFile[]> {
    this.received.push(data);
    return [{ format: 'png', path: 'memory.png', bytes: 0 }];
  }
}

function logger(entries: LogEntry[] = [], level: 'debug' | 'info' = 'info'): Logger {
  return new Logger('test', level, {}, { sink: (entry) => entries.push(entry) });
}

describe('computeComparison', () => {
  it('runs the model over the configured sweep', () => {
    const config = defaultRunConfig('/work');
    const comparison = computeComparison(config.geometry, config.sweep);
    expect(comparison.rpm).toHaveLength(9);
    expect(comparison.series[0].points[4].brakePowerKw).toBeCloseTo(739.267, 3);
  });

  it('fails fast on invalid geometry', () => {
    expect(() => computeComparison({ compressionRatio: 10, boreM: -0.08, strokeM: 0.09 }, { start: 1000, end: 2000, step: 500 })).toThrow(
      InvalidParameterError,
    );
  });
});

describe('runAnalysis', () => {
  it('hands the noisy curves to the exporter', async () => {
    const exporter = new MemoryExporter();
    const result = await runAnalysis(defaultRunConfig('/work'), { logger: logger(), exporter });

    expect(exporter.received).toEqual([result.report]);
    expect(result.files).toEqual([{ format: 'png', path: 'memory.png', bytes: 0 }]);
    expect(result.report.rpm).toEqual([1000, 1500, 2000, 2500, 3000, 3500, 4000, 4500, 5000]);
    expect(result.report.curves[0].brakePowerKw).not.toEqual(toCurveSet(result.comparison.series[0]).brakePowerKw);
    expect(result.summaries.map((s) => s.fuel)).toEqual(['E10', 'E20']);
  });

  it('is reproducible for a fixed seed', async () => {
    const config = defaultRunConfig('/work');
    const a = await runAnalysis(config, { logger: logger(), exporter: new MemoryExporter() });
    const b = await runAnalysis(config, { logger: logger(), exporter: new MemoryExporter() });
    expect(a.report).toEqual(b.report);
  });

  it('exports the model curves unchanged without noise', async () => {
    const config = mergeRunConfig(defaultRunConfig('/work'), { noise: { fraction: 0 } });
    const result = await runAnalysis(config, { logger: logger(), exporter: new MemoryExporter() });

    expect(result.report.curves[0]).toEqual(toCurveSet(result.comparison.series[0]));
    expect(result.report.curves[1]).toEqual(toCurveSet(result.comparison.series[1]));
    expect(result.summaries[0].peakPowerKw.rpm).toBe(5000);
    expect(result.summaries[0].minBsfcGPerKwh.rpm).toBe(3000);
    expect(result.summaries[0].peakEfficiencyPct).toEqual({ value: 32, rpm: 3000 });
  });

  it('logs clamped points at debug level', async () => {
    const entries: LogEntry[] = [];
    const config = mergeRunConfig(defaultRunConfig('/work'), { sweep: { start: 2500, end: 3000, step: 500 } });
    await runAnalysis(config, { logger: logger(entries, 'debug'), exporter: new MemoryExporter() });

    const clamps = entries.filter((e) => e.level === 'debug').map((e) => [e.message, e.fuel, e.rpm]);
    expect(clamps).toEqual([
      ['volumetric efficiency at floor', 'E10', 2500],
      ['thermal efficiency at floor', 'E10', 2500],
      ['volumetric efficiency at floor', 'E20', 2500],
      ['thermal efficiency at floor', 'E20', 2500],
    ]);
  });

  it('uses an injected sampler in place of the seeded generator', async () => {
    const config = mergeRunConfig(defaultRunConfig('/work'), { noise: { fraction: 0.5 } });
    const result = await runAnalysis(config, { logger: logger(), exporter: new MemoryExporter(), sampler: () => 1 });
    const base = toCurveSet(result.comparison.series[1]);
    result.report.curves[1].torqueNm.forEach((v, i) => expect(v).toBeCloseTo(base.torqueNm[i] * 1.5, 9));
  });
});
