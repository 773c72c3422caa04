import { v4 as uuidv4 } from 'uuid';
import type { ResultBundle, ResultRow } from '../types/index.js';
import { buildExportDocument, formatRows, formatSingleRow } from '../utils/result-format.js';

export const NO_RESULTS_TEXT = '🔍 No results found for your query. Try refining your search criteria.';

export type Presentation =
  | { kind: 'empty'; text: string }
  | { kind: 'inline'; text: string; totalRows: number }
  | {
      kind: 'summary';
      text: string;
      bundleId: string;
      totalRows: number;
      previewRows: number;
      downloadUrl: string;
    };

export interface ResultPresenterOptions {
  threshold: number; // Largest result set rendered inline
  previewRows: number;
  urlPrefix: string;
}

/**
 * Large result sets kept for later export, keyed by bundle id
 */
export class ResultBundleStore {
  private bundles: Map<string, ResultBundle> = new Map();

  put(originalQuery: string, rows: readonly ResultRow[], now: number = Date.now()): ResultBundle {
    let bundleId = `summary_${now}_${uuidv4().slice(0, 8)}`;
    while (this.bundles.has(bundleId)) {
      bundleId = `summary_${now}_${uuidv4().slice(0, 8)}`;
    }

    const bundle: ResultBundle = Object.freeze({
      bundleId,
      originalQuery,
      rows: Object.freeze(rows.map((row) => Object.freeze({ ...row }))),
      createdAt: now,
    });
    this.bundles.set(bundleId, bundle);
    return bundle;
  }

  get(bundleId: string): ResultBundle | undefined {
    return this.bundles.get(bundleId);
  }

  /**
   * Drop bundles older than `maxAgeMs`. Returns how many were dropped.
   */
  sweep(now: number, maxAgeMs: number): number {
    let removed = 0;
    for (const [bundleId, bundle] of this.bundles) {
      if (now - bundle.createdAt > maxAgeMs) {
        this.bundles.delete(bundleId);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.bundles.size;
  }
}

export class ResultPresenter {
  private store: ResultBundleStore;
  private options: ResultPresenterOptions;

  constructor(store: ResultBundleStore, options: ResultPresenterOptions) {
    this.store = store;
    this.options = options;
  }

  /**
   * Decide how a result set reaches the user: a no-results notice, an inline
   * table, or a stored bundle with a preview and a download link.
   */
  present(rows: readonly ResultRow[], originalQuery: string, now: number = Date.now()): Presentation {
    if (rows.length === 0) {
      return { kind: 'empty', text: NO_RESULTS_TEXT };
    }

    if (rows.length > this.options.threshold) {
      return this.summarize(rows, originalQuery, now);
    }

    const body = rows.length === 1 && rows[0] ? formatSingleRow(rows[0]) : formatRows(rows);
    return {
      kind: 'inline',
      totalRows: rows.length,
      text:
        '**Results for your query:**\n\n' +
        '```\n' +
        body +
        '\n```' +
        `\n\n📋 **Summary:** Found ${rows.length} result(s)`,
    };
  }

  /**
   * Plain-text export of a stored bundle, or null when it is unknown or expired
   */
  export(bundleId: string, now: number = Date.now()): string | null {
    const bundle = this.store.get(bundleId);
    if (!bundle) {
      return null;
    }
    return buildExportDocument(bundle.originalQuery, bundle.rows, new Date(now));
  }

  downloadUrl(bundleId: string): string {
    return `${this.options.urlPrefix}/download/summary/${bundleId}`;
  }

  private summarize(rows: readonly ResultRow[], originalQuery: string, now: number): Presentation {
    const bundle = this.store.put(originalQuery, rows, now);
    const preview = rows.slice(0, this.options.previewRows);
    const downloadUrl = this.downloadUrl(bundle.bundleId);

    console.log(`📦 Stored ${rows.length} results as ${bundle.bundleId}`);

    return {
      kind: 'summary',
      bundleId: bundle.bundleId,
      totalRows: rows.length,
      previewRows: preview.length,
      downloadUrl,
      text:
        '📊 **Large Result Set Found**\n\n' +
        `Found **${rows.length} results** for your query.\n\n` +
        `**Preview (first ${preview.length} results):**\n\n` +
        '```\n' +
        formatRows(preview) +
        `\n... and ${rows.length - preview.length} more results` +
        '\n```' +
        '\n\n📁 **Download Complete Results:**\n' +
        `Click [here](${downloadUrl}) to download all results as a text file.`,
    };
  }
}
