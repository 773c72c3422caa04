import { QueryIntent, type ChartKind } from '../types/index.js';

export const DEFECT_PREFIX = 'defect:';

export const CHART_KEYWORDS: readonly string[] = ['chart', 'graph', 'visualize', 'plot'];

/**
 * Classify a chat message. The `defect:` prefix wins over everything else;
 * otherwise any visualization keyword makes it a chart query.
 */
export function classifyIntent(text: string): QueryIntent {
  const lower = text.toLowerCase();

  if (lower.startsWith(DEFECT_PREFIX)) {
    return QueryIntent.Defect;
  }
  if (CHART_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    return QueryIntent.Chart;
  }
  return QueryIntent.Text;
}

/**
 * Pie when the question asks for one, bar otherwise
 */
export function chartKindFor(text: string): ChartKind {
  return text.toLowerCase().includes('pie') ? 'pie' : 'bar';
}
