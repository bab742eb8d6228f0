export type FuelBlendId = 'E10' | 'E20';

export interface EngineGeometry {
  compressionRatio: number;
  boreM: number;
  strokeM: number;
}

/** Brake thermal efficiency as a downward parabola about PEAK_EFFICIENCY_RPM, floored. */
export interface ThermalEfficiencyCurve {
  peak: number;
  curvature: number;
  floor: number;
}

export interface FuelProperties {
  id: FuelBlendId;
  label: string;
  lhvJPerKg: number;
  afr: number;
  efficiency: ThermalEfficiencyCurve;
}

export interface RpmSweepRange {
  start: number;
  end: number;
  step: number;
}

export interface PerformancePoint {
  rpm: number;
  volumetricEfficiency: number;
  airMassFlowKgS: number;
  fuelMassFlowKgS: number;
  thermalEfficiency: number;
  brakePowerKw: number;
  torqueNm: number;
  bsfcKgPerKwh: number;
  veClamped: boolean;
  etaClamped: boolean;
}

export interface PerformanceSeries {
  fuel: FuelProperties;
  points: PerformancePoint[];
}

export interface BlendComparison {
  rpm: number[];
  series: [PerformanceSeries, PerformanceSeries];
}

/** The four curves handed to the report, one array entry per sweep RPM. */
export interface CurveSet {
  fuel: FuelProperties;
  brakePowerKw: number[];
  torqueNm: number[];
  bsfcKgPerKwh: number[];
  thermalEfficiency: number[];
}

export interface ReportData {
  rpm: number[];
  curves: [CurveSet, CurveSet];
}

export type CurveKey = Exclude<keyof CurveSet, 'fuel'>;
