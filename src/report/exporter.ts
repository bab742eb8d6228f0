import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ReportData } from '../domain/types';
import type { ExportFormat } from '../config';
import { ExportError } from '../domain/errors';
import type { Logger } from '../logger';
import { CanvasSurface } from './canvas-surface';
import { PdfSurface } from './pdf-surface';
import { FIGURE_HEIGHT, FIGURE_WIDTH, buildFigurePanels, drawFigure } from './performance-figure';
import type { FigurePanel } from './performance-figure';

export interface ExportedFile {
  format: ExportFormat;
  path: string;
  bytes: number;
}

/** Consumes the final curves; knows nothing about how they were computed. */
export interface ReportExporter {
  export(data: ReportData): Promise<ExportedFile[]>;
}

export interface FigureExporterOptions {
  dir: string;
  baseName: string;
  formats: readonly ExportFormat[];
  /** Raster pixel ratio for the PNG. */
  pngScale: number;
}

export async function renderPng(panels: readonly FigurePanel[], scale: number = 1): Promise<Buffer> {
  const surface = new CanvasSurface(FIGURE_WIDTH, FIGURE_HEIGHT, scale);
  drawFigure(surface, panels);
  return surface.toPng();
}

export async function renderPdf(panels: readonly FigurePanel[]): Promise<Buffer> {
  const surface = new PdfSurface(FIGURE_WIDTH, FIGURE_HEIGHT);
  drawFigure(surface, panels);
  return surface.toPdf();
}

export class FigureExporter implements ReportExporter {
  private readonly options: FigureExporterOptions;
  private readonly log: Logger;

  constructor(options: FigureExporterOptions, logger: Logger) {
    this.options = options;
    this.log = logger.child('export');
  }

  targetPath(format: ExportFormat): string {
    return path.join(this.options.dir, `${this.options.baseName}.${format}`);
  }

  async export(data: ReportData): Promise<ExportedFile[]> {
    const panels = buildFigurePanels(data);
    try {
      await mkdir(this.options.dir, { recursive: true });
    } catch (err) {
      throw new ExportError(this.options.dir, err);
    }

    const files: ExportedFile[] = [];
    for (const format of this.options.formats) {
      const target = this.targetPath(format);
      let bytes: Buffer;
      try {
        bytes = format === 'png' ? await renderPng(panels, this.options.pngScale) : await renderPdf(panels);
        await writeFile(target, bytes);
      } catch (err) {
        throw new ExportError(target, err);
      }
      this.log.info('figure written', { format, path: target, bytes: bytes.length });
      files.push({ format, path: target, bytes: bytes.length });
    }
    return files;
  }
}
