import { describe, it, expect } from 'vitest';
import {
  airMassFlow,
  brakePower,
  brakeSpecificFuelConsumption,
  computeBlendComparison,
  computePerformancePoint,
  computePerformanceSeries,
  fuelMassFlow,
  sweptVolume,
  thermalEfficiency,
  torqueFromPower,
  volumetricEfficiency,
} from './engine-model';
import { ModelError } from './errors';
import { buildRpmSweep } from './parameters';
import { getBlendPair, getFuel } from '../data/fuel-loader';
import type { EngineGeometry } from './types';

const geometry: EngineGeometry = { compressionRatio: 10, boreM: 0.08, strokeM: 0.09 };
const E10 = getFuel('E10');
const E20 = getFuel('E20');

describe('sweptVolume', () => {
  it('is π/4 · bore² · stroke', () => {
    expect(sweptVolume(geometry)).toBeCloseTo(4.5239e-4, 7);
  });
});

describe('volumetricEfficiency', () => {
  it('peaks at exactly 0.90 at 3000 rpm', () => {
    expect(volumetricEfficiency(3000)).toEqual({ value: 0.9, clamped: false });
  });

  it('follows the parabola near the peak', () => {
    const ve = volumetricEfficiency(3100);
    expect(ve.value).toBeCloseTo(0.88, 12);
    expect(ve.clamped).toBe(false);
    expect(volumetricEfficiency(3300).value).toBeCloseTo(0.72, 12);
  });

  it('clamps to 0.7 away from the peak', () => {
    for (const rpm of [1000, 2500, 3400, 5000, 8000]) {
      expect(volumetricEfficiency(rpm)).toEqual({ value: 0.7, clamped: true });
    }
  });
});

describe('thermalEfficiency', () => {
  it('uses a different peak per blend', () => {
    expect(thermalEfficiency(3000, E10.efficiency).value).toBe(0.32);
    expect(thermalEfficiency(3000, E20.efficiency).value).toBe(0.33);
  });

  it('uses a different curvature per blend', () => {
    expect(thermalEfficiency(3100, E10.efficiency).value).toBeCloseTo(0.295, 12);
    expect(thermalEfficiency(3100, E20.efficiency).value).toBeCloseTo(0.31, 12);
  });

  it('never drops below the blend floor', () => {
    for (const rpm of buildRpmSweep({ start: 500, end: 9000, step: 250 })) {
      expect(thermalEfficiency(rpm, E10.efficiency).value).toBeGreaterThanOrEqual(0.25);
      expect(thermalEfficiency(rpm, E20.efficiency).value).toBeGreaterThanOrEqual(0.26);
    }
    expect(thermalEfficiency(1000, E10.efficiency)).toEqual({ value: 0.25, clamped: true });
    expect(thermalEfficiency(1000, E20.efficiency)).toEqual({ value: 0.26, clamped: true });
  });
});

describe('calculation chain', () => {
  it('reproduces the 3000 rpm E10 operating point', () => {
    const vs = sweptVolume(geometry);
    const maf = airMassFlow(3000, vs, 0.9);
    const mf = fuelMassFlow(maf, 14.1);
    const bp = brakePower(mf, 43.54e6, 0.32);

    expect(maf).toBeCloseTo(0.7481, 4);
    expect(mf).toBeCloseTo(0.05306, 5);
    expect(bp).toBeCloseTo(739.27, 2);
  });

  it('computes a full point consistently', () => {
    const p = computePerformancePoint(3000, sweptVolume(geometry), E10);

    expect(p.rpm).toBe(3000);
    expect(p.volumetricEfficiency).toBe(0.9);
    expect(p.thermalEfficiency).toBe(0.32);
    expect(p.veClamped).toBe(false);
    expect(p.etaClamped).toBe(false);
    expect(p.brakePowerKw).toBeCloseTo(739.267, 3);
    expect(Math.abs(p.brakePowerKw - 739.0) / 739.0).toBeLessThan(0.001);
    expect(p.torqueNm).toBeCloseTo(2353.33, 2);
    expect(p.bsfcKgPerKwh).toBeCloseTo(0.258383, 6);
  });

  it('gives E20 the same air flow with a richer fuel flow', () => {
    const vs = sweptVolume(geometry);
    const a = computePerformancePoint(2000, vs, E10);
    const b = computePerformancePoint(2000, vs, E20);

    expect(b.airMassFlowKgS).toBe(a.airMassFlowKgS);
    expect(b.fuelMassFlowKgS).toBeGreaterThan(a.fuelMassFlowKgS);
    expect(b.brakePowerKw).toBeCloseTo(313.264, 3);
    expect(a.brakePowerKw).toBeCloseTo(299.472, 3);
  });
});

describe('torqueFromPower', () => {
  it('holds T = BP · 9550 / rpm for every computed point', () => {
    const series = computePerformanceSeries(geometry, E10, buildRpmSweep({ start: 1000, end: 5000, step: 500 }));
    for (const p of series.points) {
      expect(p.torqueNm).toBe((p.brakePowerKw * 9550) / p.rpm);
    }
  });

  it('converts 1 kW at 9550 rpm to 1 Nm', () => {
    expect(torqueFromPower(1, 9550)).toBe(1);
  });
});

describe('brakeSpecificFuelConsumption', () => {
  it('is finite and positive wherever brake power is positive', () => {
    const comparison = computeBlendComparison(geometry, getBlendPair(), buildRpmSweep({ start: 600, end: 7000, step: 200 }));
    for (const series of comparison.series) {
      for (const p of series.points) {
        expect(p.brakePowerKw).toBeGreaterThan(0);
        expect(Number.isFinite(p.bsfcKgPerKwh)).toBe(true);
        expect(p.bsfcKgPerKwh).toBeGreaterThan(0);
      }
    }
  });

  it('refuses zero brake power instead of dividing by it', () => {
    expect(() => brakeSpecificFuelConsumption(0.01, 0)).toThrow(ModelError);
    expect(() => brakeSpecificFuelConsumption(0.01, -5)).toThrow(/non-positive brake power/);
  });
});

describe('computeBlendComparison', () => {
  it('keeps every series aligned with the sweep', () => {
    const rpm = buildRpmSweep({ start: 1000, end: 5000, step: 500 });
    const comparison = computeBlendComparison(geometry, getBlendPair(), rpm);

    expect(comparison.rpm).toEqual(rpm);
    expect(comparison.series.map((s) => s.fuel.id)).toEqual(['E10', 'E20']);
    for (const series of comparison.series) {
      expect(series.points).toHaveLength(9);
      expect(series.points.map((p) => p.rpm)).toEqual(rpm);
    }
  });

  it('clamps every sweep point except the 3000 rpm peak', () => {
    const comparison = computeBlendComparison(geometry, getBlendPair(), buildRpmSweep({ start: 1000, end: 5000, step: 500 }));
    const clamped = comparison.series[0].points.filter((p) => p.veClamped).map((p) => p.rpm);
    expect(clamped).toEqual([1000, 1500, 2000, 2500, 3500, 4000, 4500, 5000]);
  });
});
