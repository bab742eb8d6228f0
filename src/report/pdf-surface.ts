import PDFDocument from 'pdfkit';
import type { MarkerShape, PlotSurface, Point, StrokeStyle, TextStyle } from './plot-surface';

// A4 landscape, in points.
export const PDF_PAGE_WIDTH = 841.89;
export const PDF_PAGE_HEIGHT = 595.28;
const PAGE_MARGIN = 18;

/**
 * Vector backend. The figure is scaled to fit the page and centred on it,
 * so the PDF keeps the raster figure's proportions.
 */
export class PdfSurface implements PlotSurface {
  readonly width: number;
  readonly height: number;
  private doc: PDFKit.PDFDocument;
  private chunks: Buffer[] = [];
  private done: Promise<Buffer>;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.doc = new PDFDocument({
      size: [PDF_PAGE_WIDTH, PDF_PAGE_HEIGHT],
      margin: 0,
      info: { Title: 'E10 vs E20 performance', Creator: 'e10-e20-dyno' },
    });
    this.done = new Promise<Buffer>((resolve, reject) => {
      this.doc.on('data', (chunk: Buffer) => this.chunks.push(chunk));
      this.doc.on('end', () => resolve(Buffer.concat(this.chunks)));
      this.doc.on('error', reject);
    });

    const k = Math.min((PDF_PAGE_WIDTH - 2 * PAGE_MARGIN) / width, (PDF_PAGE_HEIGHT - 2 * PAGE_MARGIN) / height);
    this.doc.translate((PDF_PAGE_WIDTH - width * k) / 2, (PDF_PAGE_HEIGHT - height * k) / 2);
    this.doc.scale(k);
  }

  fillRect(x: number, y: number, w: number, h: number, color: string): void {
    this.doc.rect(x, y, w, h).fill(color);
  }

  strokeRect(x: number, y: number, w: number, h: number, style: StrokeStyle): void {
    this.applyStroke(style);
    this.doc.rect(x, y, w, h).stroke();
    this.doc.undash();
  }

  line(from: Point, to: Point, style: StrokeStyle): void {
    this.polyline([from, to], style);
  }

  polyline(points: readonly Point[], style: StrokeStyle): void {
    if (points.length < 2) return;
    this.applyStroke(style);
    this.doc.lineJoin('round');
    this.doc.moveTo(points[0].x, points[0].y);
    for (let i = 1; i < points.length; i++) {
      this.doc.lineTo(points[i].x, points[i].y);
    }
    this.doc.stroke();
    this.doc.undash();
  }

  marker(center: Point, shape: MarkerShape, size: number, stroke: StrokeStyle, fill: string): void {
    const r = size / 2;
    this.applyStroke(stroke);
    if (shape === 'circle') {
      this.doc.circle(center.x, center.y, r);
    } else {
      this.doc.rect(center.x - r, center.y - r, size, size);
    }
    this.doc.fillAndStroke(fill, stroke.color);
  }

  text(value: string, at: Point, style: TextStyle): void {
    const doc = this.doc;
    doc.save();
    doc.font(style.bold ? 'Helvetica-Bold' : 'Helvetica').fontSize(style.size).fillColor(style.color);
    if (style.rotate) doc.rotate(-style.rotate, { origin: [at.x, at.y] });

    const w = doc.widthOfString(value);
    const dx = style.align === 'center' ? -w / 2 : style.align === 'right' ? -w : 0;
    // pdfkit anchors text at the top of the line box.
    const dy = style.baseline === 'middle' ? -style.size / 2 : style.baseline === 'bottom' ? -style.size : 0;
    doc.text(value, at.x + dx, at.y + dy, { lineBreak: false });
    doc.restore();
  }

  /** Ends the document; the surface cannot be drawn on afterwards. */
  toPdf(): Promise<Buffer> {
    this.doc.end();
    return this.done;
  }

  private applyStroke(style: StrokeStyle): void {
    this.doc.lineWidth(style.width).strokeColor(style.color);
    if (style.dash) this.doc.dash(style.dash[0], { space: style.dash[1] });
    else this.doc.undash();
  }
}
