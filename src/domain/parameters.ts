import { z } from 'zod';
import type { EngineGeometry, FuelProperties, RpmSweepRange } from './types';
import { InvalidParameterError } from './errors';

const positive = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).finite().positive(`${label} must be > 0`);

export const engineGeometrySchema = z.object({
  compressionRatio: positive('compression ratio'),
  boreM: positive('bore'),
  strokeM: positive('stroke'),
});

export const fuelPropertiesSchema = z.object({
  id: z.enum(['E10', 'E20']),
  label: z.string().min(1),
  lhvJPerKg: positive('LHV'),
  afr: positive('AFR'),
  efficiency: z.object({
    peak: positive('efficiency peak'),
    curvature: z.number().finite().nonnegative(),
    floor: positive('efficiency floor'),
  }),
});

// Float drift on fractional steps must not drop the end point.
const SWEEP_EPSILON = 1e-9;

export const MAX_SWEEP_POINTS = 10_000;

export function sweepPointCount(range: RpmSweepRange): number {
  return Math.floor((range.end - range.start) / range.step + SWEEP_EPSILON) + 1;
}

export const rpmSweepSchema = z
  .object({
    start: positive('RPM start'),
    end: positive('RPM end'),
    step: positive('RPM step'),
  })
  .refine((s) => s.end >= s.start, { message: 'RPM end must be >= start', path: ['end'] })
  .refine((s) => sweepPointCount(s) <= MAX_SWEEP_POINTS, {
    message: `RPM step gives more than ${MAX_SWEEP_POINTS} points`,
    path: ['step'],
  });

/** Re-throws the first zod issue as an InvalidParameterError on the given root field. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, root: string): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const field = [root, ...issue.path].join('.');
  throw new InvalidParameterError(field, issue.message);
}

export function createEngineGeometry(input: unknown): EngineGeometry {
  return parseOrThrow(engineGeometrySchema, input, 'geometry');
}

export function createFuelProperties(input: unknown): FuelProperties {
  return parseOrThrow(fuelPropertiesSchema, input, 'fuel');
}

export function buildRpmSweep(range: RpmSweepRange): number[] {
  const { start, end, step } = parseOrThrow(rpmSweepSchema, range, 'sweep');
  const count = sweepPointCount({ start, end, step });
  const rpm: number[] = [];
  for (let i = 0; i < count; i++) {
    rpm.push(start + i * step);
  }
  return rpm;
}
