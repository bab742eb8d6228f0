import type { CurveSet, FuelBlendId, ReportData } from './types';

export interface AtRpm {
  value: number;
  rpm: number;
}

export interface BlendSummary {
  fuel: FuelBlendId;
  peakPowerKw: AtRpm;
  peakTorqueNm: AtRpm;
  minBsfcGPerKwh: AtRpm;
  peakEfficiencyPct: AtRpm;
}

function extremum(values: readonly number[], rpm: readonly number[], pick: 'max' | 'min'): AtRpm {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (pick === 'max' ? values[i] > values[best] : values[i] < values[best]) best = i;
  }
  return { value: values[best], rpm: rpm[best] };
}

export function summarizeCurves(curves: CurveSet, rpm: readonly number[]): BlendSummary {
  const bsfc = extremum(curves.bsfcKgPerKwh, rpm, 'min');
  const eta = extremum(curves.thermalEfficiency, rpm, 'max');
  return {
    fuel: curves.fuel.id,
    peakPowerKw: extremum(curves.brakePowerKw, rpm, 'max'),
    peakTorqueNm: extremum(curves.torqueNm, rpm, 'max'),
    minBsfcGPerKwh: { value: bsfc.value * 1000, rpm: bsfc.rpm },
    peakEfficiencyPct: { value: eta.value * 100, rpm: eta.rpm },
  };
}

export function summarizeReport(data: ReportData): BlendSummary[] {
  return data.curves.map((c) => summarizeCurves(c, data.rpm));
}

export function formatSummary(summary: BlendSummary): string {
  const at = (a: AtRpm, digits: number, unit: string) => `${a.value.toFixed(digits)} ${unit} @ ${a.rpm} rpm`;
  return [
    `${summary.fuel}:`,
    `power ${at(summary.peakPowerKw, 1, 'kW')}`,
    `torque ${at(summary.peakTorqueNm, 1, 'Nm')}`,
    `bsfc ${at(summary.minBsfcGPerKwh, 1, 'g/kWh')}`,
    `efficiency ${at(summary.peakEfficiencyPct, 2, '%')}`,
  ].join(' ');
}
