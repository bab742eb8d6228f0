import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { engineGeometrySchema, parseOrThrow, rpmSweepSchema } from './domain/parameters';
import { DEFAULT_NOISE_FRACTION, DEFAULT_NOISE_SEED } from './domain/noise';
import { InvalidParameterError } from './domain/errors';
import { getDefaultGeometry } from './data/fuel-loader';
import { LOG_LEVELS, isLogLevel } from './logger';
import type { LogLevel } from './logger';

export const DEFAULT_BASE_NAME = 'E10_E20_PerformanceGraphs';

export const exportFormatSchema = z.enum(['png', 'pdf']);
export type ExportFormat = z.infer<typeof exportFormatSchema>;

export const runConfigSchema = z.object({
  geometry: engineGeometrySchema,
  sweep: rpmSweepSchema,
  noise: z.object({
    fraction: z.number().finite().nonnegative(),
    seed: z.number().int().nonnegative(),
  }),
  output: z.object({
    dir: z.string().min(1),
    baseName: z.string().min(1),
    formats: z.array(exportFormatSchema).min(1),
    /** PNG pixel ratio over the 1000×800 figure. */
    pngScale: z.number().finite().positive().max(4),
  }),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type RunConfig = z.infer<typeof runConfigSchema>;

type DeepPartial<T> = T extends readonly unknown[]
  ? T
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

export type RunConfigOverrides = DeepPartial<RunConfig>;

export function defaultRunConfig(cwd: string = process.cwd()): RunConfig {
  return {
    geometry: getDefaultGeometry(),
    sweep: { start: 1000, end: 5000, step: 500 },
    noise: { fraction: DEFAULT_NOISE_FRACTION, seed: DEFAULT_NOISE_SEED },
    output: { dir: cwd, baseName: DEFAULT_BASE_NAME, formats: ['png', 'pdf'], pngScale: 1 },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}

/** Later layers win. The merged result is validated as a whole. */
export function mergeRunConfig(base: RunConfig, ...layers: Record<string, unknown>[]): RunConfig {
  let merged: Record<string, unknown> = { ...base };
  for (const layer of layers) {
    merged = deepMerge(merged, layer);
  }
  return parseOrThrow(runConfigSchema, merged, 'config');
}

export function loadConfigFile(path: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidParameterError('config', `cannot read ${path}: ${reason}`);
  }
  if (!isPlainObject(raw)) {
    throw new InvalidParameterError('config', `${path} must contain a JSON object`);
  }
  return raw;
}

export interface CliArgs {
  configPath?: string;
  overrides: RunConfigOverrides;
  help: boolean;
}

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === '' || Number.isNaN(n)) {
    throw new InvalidParameterError(flag, `expected a number, got "${value}"`);
  }
  return n;
}

function toLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  if (!isLogLevel(value)) {
    throw new InvalidParameterError('log-level', `expected one of ${LOG_LEVELS.join(', ')}, got "${value}"`);
  }
  return value;
}

function toFormats(values: string[] | undefined): ExportFormat[] | undefined {
  if (values === undefined) return undefined;
  return values
    .flatMap((v) => v.split(','))
    .map((v) => {
      const parsed = exportFormatSchema.safeParse(v.trim().toLowerCase());
      if (!parsed.success) throw new InvalidParameterError('format', `unsupported format "${v}"`);
      return parsed.data;
    });
}

function parseArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        config: { type: 'string', short: 'c' },
        'compression-ratio': { type: 'string' },
        bore: { type: 'string' },
        stroke: { type: 'string' },
        'rpm-start': { type: 'string' },
        'rpm-end': { type: 'string' },
        'rpm-step': { type: 'string' },
        noise: { type: 'string' },
        'no-noise': { type: 'boolean' },
        seed: { type: 'string' },
        'out-dir': { type: 'string', short: 'o' },
        'base-name': { type: 'string' },
        format: { type: 'string', multiple: true },
        'png-scale': { type: 'string' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    // node:util reports unknown flags and missing values as plain TypeErrors.
    throw new InvalidParameterError('argv', err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgv(argv);

  const noiseFraction = values['no-noise'] ? 0 : toNumber('noise', values.noise);

  return {
    configPath: values.config,
    help: values.help ?? false,
    overrides: {
      geometry: {
        compressionRatio: toNumber('compression-ratio', values['compression-ratio']),
        boreM: toNumber('bore', values.bore),
        strokeM: toNumber('stroke', values.stroke),
      },
      sweep: {
        start: toNumber('rpm-start', values['rpm-start']),
        end: toNumber('rpm-end', values['rpm-end']),
        step: toNumber('rpm-step', values['rpm-step']),
      },
      noise: {
        fraction: noiseFraction,
        seed: toNumber('seed', values.seed),
      },
      output: {
        dir: values['out-dir'],
        baseName: values['base-name'],
        formats: toFormats(values.format),
        pngScale: toNumber('png-scale', values['png-scale']),
      },
      logLevel: toLogLevel(values['log-level']),
    },
  };
}

export function resolveRunConfig(argv: string[], cwd: string = process.cwd()): { config: RunConfig; help: boolean } {
  const cli = parseCliArgs(argv);
  const fileLayer = cli.configPath !== undefined ? loadConfigFile(cli.configPath) : {};
  return {
    config: mergeRunConfig(defaultRunConfig(cwd), fileLayer, cli.overrides),
    help: cli.help,
  };
}

export const USAGE = `Usage: e10-e20-dyno [options]

  -c, --config <file>        JSON run configuration
      --compression-ratio <n>
      --bore <m>             cylinder bore in metres (default 0.08)
      --stroke <m>           piston stroke in metres (default 0.09)
      --rpm-start <rpm>      default 1000
      --rpm-end <rpm>        default 5000
      --rpm-step <rpm>       default 500
      --noise <fraction>     multiplicative noise, default 0.02
      --no-noise             same as --noise 0
      --seed <int>           noise seed, default 1
  -o, --out-dir <dir>        default: working directory
      --base-name <name>     default ${DEFAULT_BASE_NAME}
      --format <png|pdf>     repeatable or comma separated, default both
      --png-scale <n>        PNG pixel ratio, up to 4, default 1
      --log-level <level>    ${LOG_LEVELS.join('|')}
  -h, --help`;
