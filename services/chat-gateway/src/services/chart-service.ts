import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { ChartRenderer, ResultRow } from '../types/index.js';
import { InternalError, NotFoundError, PathSecurityError } from '../utils/errors.js';
import { chartKindFor } from './intent-router.js';

const CONTENT_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
};

export interface StoredChart {
  data: Buffer;
  contentType: string;
}

function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && codes.includes(error.code);
}

/**
 * Renders charts into the chart directory and serves them back by file name.
 * Callers only ever see bare file names, never directory paths.
 */
export class ChartService {
  private renderer: ChartRenderer;
  private outputDir: string;

  constructor(renderer: ChartRenderer, outputDir: string) {
    this.renderer = renderer;
    this.outputDir = path.resolve(outputDir);
  }

  async createChart(rows: readonly ResultRow[], originalQuery: string, now: number = Date.now()): Promise<string> {
    const kind = chartKindFor(originalQuery);
    const image = await this.renderer.render({
      kind,
      title: kind === 'pie' ? 'Issue Distribution' : 'Issue Summary',
      rows,
    });

    await mkdir(this.outputDir, { recursive: true });
    const filename = `chart_output_${now}_${uuidv4().slice(0, 8)}.png`;
    await writeFile(path.join(this.outputDir, filename), image);

    console.log(`📈 Generated ${kind} chart ${filename} (${image.length} bytes)`);
    return filename;
  }

  /**
   * Absolute path of a chart file. Throws PathSecurityError for anything that
   * is not a plain file name inside the chart directory.
   */
  resolveChartPath(filename: string): string {
    if (
      filename === '' ||
      filename.includes('/') ||
      filename.includes('\\') ||
      filename.includes('\0') ||
      filename.includes('..')
    ) {
      throw new PathSecurityError();
    }

    const resolved = path.resolve(this.outputDir, filename);
    if (path.dirname(resolved) !== this.outputDir) {
      throw new PathSecurityError();
    }
    return resolved;
  }

  async readChart(filename: string): Promise<StoredChart> {
    const resolved = this.resolveChartPath(filename);

    let data: Buffer;
    try {
      data = await readFile(resolved);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'EISDIR', 'ENOTDIR')) {
        throw new NotFoundError('Chart');
      }
      throw new InternalError('Unable to read chart', error);
    }

    return {
      data,
      contentType: CONTENT_TYPES[path.extname(resolved).toLowerCase()] ?? 'image/png',
    };
  }
}
