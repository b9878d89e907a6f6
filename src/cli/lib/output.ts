/**
 * Output Formatting for CLI Commands
 *
 * Table and JSON rendering shared by the list-style commands.
 *
 * @module cli/lib/output
 */

export type OutputFormat = 'table' | 'json';

export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function cellText(row: Readonly<Record<string, unknown>>, col: TableColumn): string {
  const value = row[col.key];
  if (col.formatter) return col.formatter(value);
  if (value === null || value === undefined) return '';
  return Array.isArray(value) ? value.join(', ') : String(value);
}

/**
 * Format rows as an aligned table
 */
export function formatTable(
  data: readonly Readonly<Record<string, unknown>>[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width !== undefined) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => cellText(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i] ?? col.header.length, col.align ?? 'left'))
    .join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns
      .map((col, i) => padCell(cellText(row, col), widths[i] ?? 0, col.align ?? 'left'))
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell to width, truncating with "~" when it does not fit
 */
export function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, Math.max(0, width - 1)) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatOutput(
  data: readonly Readonly<Record<string, unknown>>[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  return format === 'json' ? formatJson(data) : formatTable(data, columns);
}

/**
 * Common column formatters
 */
export const formatters = {
  number: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    const num = Number(value);
    return isNaN(num) ? String(value) : num.toLocaleString('en-US');
  },

  dash: (value: unknown): string => {
    if (value === null || value === undefined || value === '') return '-';
    return String(value);
  },

  yesNo: (value: unknown): string => (value ? 'yes' : 'no'),
};

export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

export function printSuccess(message: string): void {
  console.log(`Success: ${message}`);
}

export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}
