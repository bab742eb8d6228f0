export interface Point {
  x: number;
  y: number;
}

export type MarkerShape = 'circle' | 'square';

export interface StrokeStyle {
  color: string;
  width: number;
  dash?: [number, number];
}

export interface TextStyle {
  color: string;
  size: number;
  bold?: boolean;
  align: 'left' | 'center' | 'right';
  baseline: 'top' | 'middle' | 'bottom';
  /** Degrees, counter-clockwise, about the anchor point. */
  rotate?: number;
}

/**
 * Drawing primitives the figure layout needs. Coordinates are figure units
 * with the origin top-left; each backend maps them to its own device space.
 */
export interface PlotSurface {
  readonly width: number;
  readonly height: number;
  fillRect(x: number, y: number, w: number, h: number, color: string): void;
  strokeRect(x: number, y: number, w: number, h: number, style: StrokeStyle): void;
  line(from: Point, to: Point, style: StrokeStyle): void;
  polyline(points: readonly Point[], style: StrokeStyle): void;
  marker(center: Point, shape: MarkerShape, size: number, stroke: StrokeStyle, fill: string): void;
  text(value: string, at: Point, style: TextStyle): void;
}
