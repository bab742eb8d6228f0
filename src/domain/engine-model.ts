import type {
  BlendComparison,
  EngineGeometry,
  FuelProperties,
  PerformancePoint,
  PerformanceSeries,
  ThermalEfficiencyCurve,
} from './types';
import { ModelError } from './errors';

export const PEAK_EFFICIENCY_RPM = 3000;
export const AIR_DENSITY_KG_M3 = 1.225;
/** kW·rpm → N·m, 60000 / 2π rounded. */
export const TORQUE_CONSTANT = 9550;

const VE_PEAK = 0.9;
const VE_CURVATURE = 0.000002;
const VE_FLOOR = 0.7;

export function sweptVolume(geometry: EngineGeometry): number {
  return (Math.PI / 4) * (geometry.boreM * geometry.boreM) * geometry.strokeM;
}

export function volumetricEfficiency(rpm: number): { value: number; clamped: boolean } {
  const dr = rpm - PEAK_EFFICIENCY_RPM;
  const raw = VE_PEAK - VE_CURVATURE * (dr * dr);
  return raw < VE_FLOOR ? { value: VE_FLOOR, clamped: true } : { value: raw, clamped: false };
}

// Four-stroke: one intake charge every two revolutions.
export function airMassFlow(rpm: number, sweptVolumeM3: number, ve: number): number {
  return (rpm / 2) * sweptVolumeM3 * AIR_DENSITY_KG_M3 * ve;
}

export function fuelMassFlow(airMassFlowKgS: number, afr: number): number {
  return airMassFlowKgS / afr;
}

export function thermalEfficiency(
  rpm: number,
  curve: ThermalEfficiencyCurve,
): { value: number; clamped: boolean } {
  const dr = rpm - PEAK_EFFICIENCY_RPM;
  const raw = curve.peak - curve.curvature * (dr * dr);
  return raw < curve.floor ? { value: curve.floor, clamped: true } : { value: raw, clamped: false };
}

export function brakePower(fuelMassFlowKgS: number, lhvJPerKg: number, eta: number): number {
  return (fuelMassFlowKgS * lhvJPerKg * eta) / 1000;
}

export function torqueFromPower(brakePowerKw: number, rpm: number): number {
  return (brakePowerKw * TORQUE_CONSTANT) / rpm;
}

/** kg/kWh. Scale by 1000 for g/kWh at display time. */
export function brakeSpecificFuelConsumption(fuelMassFlowKgS: number, brakePowerKw: number): number {
  if (!(brakePowerKw > 0)) {
    throw new ModelError('BSFC is undefined for non-positive brake power', {
      brakePowerKw,
      fuelMassFlowKgS,
    });
  }
  return (fuelMassFlowKgS * 3600) / brakePowerKw;
}

export function computePerformancePoint(
  rpm: number,
  sweptVolumeM3: number,
  fuel: FuelProperties,
): PerformancePoint {
  const ve = volumetricEfficiency(rpm);
  const maf = airMassFlow(rpm, sweptVolumeM3, ve.value);
  const mf = fuelMassFlow(maf, fuel.afr);
  const eta = thermalEfficiency(rpm, fuel.efficiency);
  const bp = brakePower(mf, fuel.lhvJPerKg, eta.value);

  return {
    rpm,
    volumetricEfficiency: ve.value,
    airMassFlowKgS: maf,
    fuelMassFlowKgS: mf,
    thermalEfficiency: eta.value,
    brakePowerKw: bp,
    torqueNm: torqueFromPower(bp, rpm),
    bsfcKgPerKwh: brakeSpecificFuelConsumption(mf, bp),
    veClamped: ve.clamped,
    etaClamped: eta.clamped,
  };
}

export function computePerformanceSeries(
  geometry: EngineGeometry,
  fuel: FuelProperties,
  rpm: readonly number[],
): PerformanceSeries {
  const vs = sweptVolume(geometry);
  return {
    fuel,
    points: rpm.map((r) => computePerformancePoint(r, vs, fuel)),
  };
}

export function computeBlendComparison(
  geometry: EngineGeometry,
  fuels: [FuelProperties, FuelProperties],
  rpm: readonly number[],
): BlendComparison {
  return {
    rpm: [...rpm],
    series: [
      computePerformanceSeries(geometry, fuels[0], rpm),
      computePerformanceSeries(geometry, fuels[1], rpm),
    ],
  };
}
