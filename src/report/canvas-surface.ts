import { createCanvas } from '@napi-rs/canvas';
import type { Canvas, SKRSContext2D } from '@napi-rs/canvas';
import type { MarkerShape, PlotSurface, Point, StrokeStyle, TextStyle } from './plot-surface';

const FONT_FAMILY = 'Helvetica, Arial, sans-serif';

export class CanvasSurface implements PlotSurface {
  readonly width: number;
  readonly height: number;
  private canvas: Canvas;
  private ctx: SKRSContext2D;

  /** `scale` is the device pixel ratio of the raster output. */
  constructor(width: number, height: number, scale: number = 1) {
    this.width = width;
    this.height = height;
    this.canvas = createCanvas(Math.round(width * scale), Math.round(height * scale));
    this.ctx = this.canvas.getContext('2d');
    this.ctx.setTransform(scale, 0, 0, scale, 0, 0);
  }

  fillRect(x: number, y: number, w: number, h: number, color: string): void {
    this.ctx.fillStyle = color;
    this.ctx.fillRect(x, y, w, h);
  }

  strokeRect(x: number, y: number, w: number, h: number, style: StrokeStyle): void {
    this.applyStroke(style);
    this.ctx.strokeRect(x, y, w, h);
    this.ctx.setLineDash([]);
  }

  line(from: Point, to: Point, style: StrokeStyle): void {
    this.polyline([from, to], style);
  }

  polyline(points: readonly Point[], style: StrokeStyle): void {
    if (points.length < 2) return;
    const ctx = this.ctx;
    this.applyStroke(style);
    ctx.lineJoin = 'round';
    ctx.beginPath();
    points.forEach((p, i) => {
      if (i === 0) ctx.moveTo(p.x, p.y);
      else ctx.lineTo(p.x, p.y);
    });
    ctx.stroke();
    ctx.setLineDash([]);
  }

  marker(center: Point, shape: MarkerShape, size: number, stroke: StrokeStyle, fill: string): void {
    const ctx = this.ctx;
    const r = size / 2;
    ctx.beginPath();
    if (shape === 'circle') {
      ctx.arc(center.x, center.y, r, 0, Math.PI * 2);
    } else {
      ctx.rect(center.x - r, center.y - r, size, size);
    }
    ctx.fillStyle = fill;
    ctx.fill();
    this.applyStroke(stroke);
    ctx.stroke();
  }

  text(value: string, at: Point, style: TextStyle): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.translate(at.x, at.y);
    if (style.rotate) ctx.rotate((-style.rotate * Math.PI) / 180);
    ctx.font = `${style.bold ? 'bold ' : ''}${style.size}px ${FONT_FAMILY}`;
    ctx.fillStyle = style.color;
    ctx.textAlign = style.align;
    ctx.textBaseline = style.baseline;
    ctx.fillText(value, 0, 0);
    ctx.restore();
  }

  toPng(): Promise<Buffer> {
    return this.canvas.encode('png');
  }

  private applyStroke(style: StrokeStyle): void {
    this.ctx.strokeStyle = style.color;
    this.ctx.lineWidth = style.width;
    this.ctx.setLineDash(style.dash ? [...style.dash] : []);
  }
}
