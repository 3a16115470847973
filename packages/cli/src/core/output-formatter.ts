/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../command-defs/strategy.js';

export type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'number') {
    // Enough precision for metrics without float noise
    return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(6)));
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format rows as a simple table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  const rows = data.filter(isRow);
  if (rows.length === 0) {
    return 'No data to display';
  }

  // Auto-detect columns from the first row if not provided
  const detectedColumns = columns ?? Object.keys(rows[0] ?? {});
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const widths = detectedColumns.map((col) =>
    Math.max(col.length, ...rows.map((row) => valueToString(row[col]).length))
  );

  const lines: string[] = [];
  lines.push(detectedColumns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | ').trimEnd());
  lines.push(widths.map((width) => '-'.repeat(width)).join('-|-'));
  for (const row of rows) {
    lines.push(
      detectedColumns
        .map((col, i) => valueToString(row[col]).padEnd(widths[i] ?? 0))
        .join(' | ')
        .trimEnd()
    );
  }

  return lines.join('\n');
}

/**
 * Format command output. Tables take an array of rows; anything else falls back to JSON.
 */
export function formatOutput(data: unknown, format: OutputFormat): string {
  if (format === 'table' && Array.isArray(data)) {
    return formatTable(data);
  }
  return formatJSON(data);
}
