import type { ResultRow } from '../types/index.js';

const INLINE_COLUMN_WIDTH = 20;
const EXPORT_COLUMN_WIDTH = 25;
const EXPORT_VALUE_LIMIT = 24;
const MAX_RULE_WIDTH = 100;
const BANNER = '='.repeat(80);

export const EXPORT_FOOTER = 'Generated by Issue Chat Gateway';

export function columnsOf(rows: readonly ResultRow[]): string[] {
  const first = rows[0];
  return first ? Object.keys(first) : [];
}

function cell(row: ResultRow, column: string): string {
  return (row[column] ?? '').trim();
}

/**
 * Shorten values longer than `maxLength` to `maxLength - 3` characters plus `...`
 */
export function truncateValue(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  return value.substring(0, maxLength - 3) + '...';
}

/**
 * One `column: value` line per field
 */
export function formatSingleRow(row: ResultRow): string {
  let formatted = '';
  for (const column of Object.keys(row)) {
    formatted += `${column.trim().padEnd(INLINE_COLUMN_WIDTH)}: ${cell(row, column)}\n`;
  }
  return formatted;
}

/**
 * Pipe-separated table. Columns come from the first row and every row is
 * rendered against them.
 */
export function formatRows(rows: readonly ResultRow[]): string {
  const columns = columnsOf(rows);
  if (columns.length === 0) {
    return '';
  }

  const header = columns.map((column) => `${column.trim().padEnd(INLINE_COLUMN_WIDTH)} | `).join('');
  let formatted = `${header}\n${'-'.repeat(Math.min(MAX_RULE_WIDTH, header.length))}\n`;

  for (const row of rows) {
    formatted += columns.map((column) => `${cell(row, column).padEnd(INLINE_COLUMN_WIDTH)} | `).join('') + '\n';
  }
  return formatted;
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/** Local time as `yyyy-MM-dd HH:mm:ss` */
export function formatDisplayTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/** Local time as `yyyyMMdd_HHmmss` */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}_` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

export function buildExportDocument(originalQuery: string, rows: readonly ResultRow[], generatedAt: Date): string {
  let output =
    'Query Results\n' +
    '==================\n\n' +
    `Query: ${originalQuery}\n` +
    `Generated on: ${formatDisplayTimestamp(generatedAt)}\n` +
    `Total Results: ${rows.length}\n` +
    `\n${BANNER}\n\n`;

  const columns = columnsOf(rows);
  if (columns.length > 0) {
    output += columns.map((column) => column.trim().padEnd(EXPORT_COLUMN_WIDTH)).join('') + '\n';
    output += '-'.repeat(columns.length * EXPORT_COLUMN_WIDTH) + '\n';

    for (const row of rows) {
      output +=
        columns.map((column) => truncateValue(cell(row, column), EXPORT_VALUE_LIMIT).padEnd(EXPORT_COLUMN_WIDTH)).join('') +
        '\n';
    }
  }

  output += `\n\n${BANNER}\n`;
  output += 'End of Results\n';
  output += `${EXPORT_FOOTER}\n`;
  return output;
}
