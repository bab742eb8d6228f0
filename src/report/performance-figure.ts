import type { CurveKey, ReportData } from '../domain/types';
import type { MarkerShape, PlotSurface, Point } from './plot-surface';

export const FIGURE_WIDTH = 1000;
export const FIGURE_HEIGHT = 800;

interface PanelSpec {
  key: CurveKey;
  title: string;
  yLabel: string;
  /** Model units → display units. */
  scale: number;
}

const PANEL_SPECS: readonly PanelSpec[] = [
  { key: 'brakePowerKw', title: 'Brake Power vs RPM', yLabel: 'Brake Power (kW)', scale: 1 },
  { key: 'torqueNm', title: 'Torque vs RPM', yLabel: 'Torque (Nm)', scale: 1 },
  { key: 'bsfcKgPerKwh', title: 'BSFC vs RPM', yLabel: 'BSFC (g/kWh)', scale: 1000 },
  { key: 'thermalEfficiency', title: 'Thermal Efficiency vs RPM', yLabel: 'Thermal Efficiency (%)', scale: 100 },
];

const SERIES_STYLES: readonly { color: string; marker: MarkerShape }[] = [
  { color: '#ff0000', marker: 'circle' },
  { color: '#0000ff', marker: 'square' },
];

const COLORS = {
  background: '#ffffff',
  axes: '#262626',
  grid: '#dfdfdf',
  text: '#262626',
};

const LINE_WIDTH = 1.5;
const MARKER_SIZE = 7;

export interface PanelSeries {
  label: string;
  color: string;
  marker: MarkerShape;
  points: Point[];
}

export interface FigurePanel {
  title: string;
  xLabel: string;
  yLabel: string;
  series: PanelSeries[];
}

export interface AxisTicks {
  min: number;
  max: number;
  step: number;
  ticks: number[];
}

export function buildFigurePanels(data: ReportData): FigurePanel[] {
  return PANEL_SPECS.map((spec) => ({
    title: spec.title,
    xLabel: 'RPM',
    yLabel: spec.yLabel,
    series: data.curves.map((curve, i) => ({
      label: curve.fuel.id,
      color: SERIES_STYLES[i].color,
      marker: SERIES_STYLES[i].marker,
      points: curve[spec.key].map((v, j) => ({ x: data.rpm[j], y: v * spec.scale })),
    })),
  }));
}

function niceStep(span: number, target: number): number {
  const raw = span / target;
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  const residual = raw / magnitude;
  if (residual <= 1) return magnitude;
  if (residual <= 2) return 2 * magnitude;
  if (residual <= 5) return 5 * magnitude;
  return 10 * magnitude;
}

/** Axis limits snapped outward to round tick values enclosing [min, max]. */
export function niceTicks(min: number, max: number, target: number = 5): AxisTicks {
  let lo = min;
  let hi = max;
  if (hi === lo) {
    const pad = Math.abs(lo) * 0.1 || 1;
    lo -= pad;
    hi += pad;
  }
  const step = niceStep(hi - lo, target);
  const first = Math.floor(lo / step);
  const last = Math.ceil(hi / step);
  const ticks: number[] = [];
  for (let i = first; i <= last; i++) {
    // toPrecision trims float noise such as 0.30000000000000004.
    ticks.push(Number((i * step).toPrecision(12)));
  }
  return { min: ticks[0], max: ticks[ticks.length - 1], step, ticks };
}

export function formatTick(value: number, step: number): string {
  const decimals = Math.max(0, -Math.floor(Math.log10(step)));
  const text = value.toFixed(decimals);
  return Number(text) === 0 ? (0).toFixed(decimals) : text;
}

function extent(values: Iterable<number>): [number, number] {
  let lo = Infinity;
  let hi = -Infinity;
  for (const v of values) {
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }
  return [lo, hi];
}

interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

const PAD = { top: 34, right: 18, bottom: 46, left: 70 };

function drawPanel(surface: PlotSurface, panel: FigurePanel, cell: Rect): void {
  const plot: Rect = {
    x: cell.x + PAD.left,
    y: cell.y + PAD.top,
    w: cell.w - PAD.left - PAD.right,
    h: cell.h - PAD.top - PAD.bottom,
  };
  if (plot.w < 20 || plot.h < 20) return;

  const all = panel.series.flatMap((s) => s.points);
  const xAxis = niceTicks(...extent(all.map((p) => p.x)));
  const yAxis = niceTicks(...extent(all.map((p) => p.y)));
  const x = (v: number) => plot.x + ((v - xAxis.min) / (xAxis.max - xAxis.min)) * plot.w;
  const y = (v: number) => plot.y + plot.h - ((v - yAxis.min) / (yAxis.max - yAxis.min)) * plot.h;

  surface.fillRect(plot.x, plot.y, plot.w, plot.h, COLORS.background);

  const grid = { color: COLORS.grid, width: 0.5 };
  const tickStyle = { color: COLORS.text, size: 11 };
  for (const t of xAxis.ticks) {
    surface.line({ x: x(t), y: plot.y }, { x: x(t), y: plot.y + plot.h }, grid);
    surface.text(formatTick(t, xAxis.step), { x: x(t), y: plot.y + plot.h + 5 }, {
      ...tickStyle,
      align: 'center',
      baseline: 'top',
    });
  }
  for (const t of yAxis.ticks) {
    surface.line({ x: plot.x, y: y(t) }, { x: plot.x + plot.w, y: y(t) }, grid);
    surface.text(formatTick(t, yAxis.step), { x: plot.x - 6, y: y(t) }, {
      ...tickStyle,
      align: 'right',
      baseline: 'middle',
    });
  }
  surface.strokeRect(plot.x, plot.y, plot.w, plot.h, { color: COLORS.axes, width: 1 });

  for (const s of panel.series) {
    const stroke = { color: s.color, width: LINE_WIDTH };
    const pts = s.points.map((p) => ({ x: x(p.x), y: y(p.y) }));
    surface.polyline(pts, stroke);
    for (const p of pts) surface.marker(p, s.marker, MARKER_SIZE, stroke, COLORS.background);
  }

  surface.text(panel.title, { x: plot.x + plot.w / 2, y: cell.y + PAD.top - 10 }, {
    color: COLORS.text,
    size: 14,
    bold: true,
    align: 'center',
    baseline: 'bottom',
  });
  surface.text(panel.xLabel, { x: plot.x + plot.w / 2, y: plot.y + plot.h + 24 }, {
    color: COLORS.text,
    size: 12,
    align: 'center',
    baseline: 'top',
  });
  surface.text(panel.yLabel, { x: cell.x + 16, y: plot.y + plot.h / 2 }, {
    color: COLORS.text,
    size: 12,
    align: 'center',
    baseline: 'middle',
    rotate: 90,
  });

  drawLegend(surface, panel.series, plot);
}

function drawLegend(surface: PlotSurface, series: readonly PanelSeries[], plot: Rect): void {
  const rowH = 18;
  const boxW = 74;
  const boxH = series.length * rowH + 8;
  const bx = plot.x + plot.w - boxW - 8;
  const by = plot.y + 8;

  surface.fillRect(bx, by, boxW, boxH, COLORS.background);
  surface.strokeRect(bx, by, boxW, boxH, { color: COLORS.axes, width: 0.75 });
  series.forEach((s, i) => {
    const cy = by + 4 + rowH * i + rowH / 2;
    const stroke = { color: s.color, width: LINE_WIDTH };
    surface.line({ x: bx + 8, y: cy }, { x: bx + 36, y: cy }, stroke);
    surface.marker({ x: bx + 22, y: cy }, s.marker, MARKER_SIZE, stroke, COLORS.background);
    surface.text(s.label, { x: bx + 42, y: cy }, { color: COLORS.text, size: 11, align: 'left', baseline: 'middle' });
  });
}

/** Lays the panels out on a 2×2 grid, row-major. */
export function drawFigure(surface: PlotSurface, panels: readonly FigurePanel[]): void {
  surface.fillRect(0, 0, surface.width, surface.height, COLORS.background);
  const cellW = surface.width / 2;
  const cellH = surface.height / 2;
  panels.forEach((panel, i) => {
    drawPanel(surface, panel, {
      x: (i % 2) * cellW,
      y: Math.floor(i / 2) * cellH,
      w: cellW,
      h: cellH,
    });
  });
}
