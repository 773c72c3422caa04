import { describe, it, expect, beforeEach } from 'vitest';
import { NO_RESULTS_TEXT, ResultBundleStore, ResultPresenter } from './result-presenter.js';
import type { ResultRow } from '../types/index.js';
import { formatSingleRow } from '../utils/result-format.js';

function issues(count: number): ResultRow[] {
  return Array.from({ length: count }, (_, i) => ({ key: `BUG-${i + 1}`, status: i % 2 === 0 ? 'Open' : 'Done' }));
}

describe('ResultPresenter', () => {
  let store: ResultBundleStore;
  let presenter: ResultPresenter;

  beforeEach(() => {
    store = new ResultBundleStore();
    presenter = new ResultPresenter(store, { threshold: 50, previewRows: 10, urlPrefix: '/api' });
  });

  it('reports an empty result set', () => {
    expect(presenter.present([], 'q')).toEqual({ kind: 'empty', text: NO_RESULTS_TEXT });
  });

  it('renders a single row as key/value lines', () => {
    const row = { key: 'BUG-3', status: 'Open' };

    expect(presenter.present([row], 'q')).toEqual({
      kind: 'inline',
      totalRows: 1,
      text: '**Results for your query:**\n\n```\n' + formatSingleRow(row) + '\n```\n\n📋 **Summary:** Found 1 result(s)',
    });
  });

  it('shows up to 50 rows inline without storing a bundle', () => {
    const presentation = presenter.present(issues(50), 'q');

    expect(presentation.kind).toBe('inline');
    expect(presentation.text).toContain('BUG-50');
    expect(presentation.text.endsWith('📋 **Summary:** Found 50 result(s)')).toBe(true);
    expect(store.size()).toBe(0);
  });

  it('summarizes 51 rows with a 10 row preview and a download link', () => {
    const presentation = presenter.present(issues(51), 'list every bug', 1_000);

    if (presentation.kind !== 'summary') {
      throw new Error(`expected a summary, got ${presentation.kind}`);
    }
    expect(presentation.bundleId).toMatch(/^summary_1000_[0-9a-f]{8}$/);
    expect(presentation.totalRows).toBe(51);
    expect(presentation.previewRows).toBe(10);
    expect(presentation.downloadUrl).toBe(`/api/download/summary/${presentation.bundleId}`);
    expect(presentation.text).toContain('BUG-10 ');
    expect(presentation.text).not.toContain('BUG-11');
    expect(presentation.text).toContain('\n... and 41 more results\n```');
    expect(presentation.text).toContain(`Click [here](/api/download/summary/${presentation.bundleId})`);
    expect(store.size()).toBe(1);
  });

  it('exports every stored row', () => {
    const presentation = presenter.present(issues(51), 'list every bug', 1_000);
    if (presentation.kind !== 'summary') {
      throw new Error('expected a summary');
    }

    const lines = (presenter.export(presentation.bundleId) ?? '').split('\n');

    expect(lines[3]).toBe('Query: list every bug');
    expect(lines[5]).toBe('Total Results: 51');
    expect(lines[9]).toBe('key'.padEnd(25) + 'status'.padEnd(25));
    expect(lines[11]).toBe('BUG-1'.padEnd(25) + 'Open'.padEnd(25));
    expect(lines[61]).toBe('BUG-51'.padEnd(25) + 'Open'.padEnd(25));
    expect(lines[65]).toBe('End of Results');
    expect(lines).toHaveLength(68);
  });

  it('generates the same export on every call', () => {
    const presentation = presenter.present(issues(60), 'q', 1_000);
    if (presentation.kind !== 'summary') {
      throw new Error('expected a summary');
    }

    expect(presenter.export(presentation.bundleId, 5_000)).toBe(presenter.export(presentation.bundleId, 5_000));
  });

  it('returns null for an unknown bundle', () => {
    expect(presenter.export('summary_0_deadbeef')).toBeNull();
  });
});

describe('ResultBundleStore', () => {
  it('snapshots rows at creation', () => {
    const store = new ResultBundleStore();
    const rows = [{ key: 'BUG-1' }];

    const bundle = store.put('q', rows, 0);
    rows.push({ key: 'BUG-2' });

    expect(bundle.rows).toEqual([{ key: 'BUG-1' }]);
    expect(Object.isFrozen(bundle.rows)).toBe(true);
    expect(Object.isFrozen(bundle.rows[0])).toBe(true);
  });

  it('sweeps bundles older than the retention', () => {
    const store = new ResultBundleStore();
    const old = store.put('q', [], 0);
    const recent = store.put('q', [], 3_000_000);

    expect(store.sweep(3_600_001, 3_600_000)).toBe(1);
    expect(store.get(old.bundleId)).toBeUndefined();
    expect(store.get(recent.bundleId)).toBe(recent);
  });
});
