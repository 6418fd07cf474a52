/**
 * Tabular Output Formatting
 *
 * Renders row objects as CSV (for persistence) or as an aligned text table
 * (for the terminal).
 *
 * @module output/tabular
 */

export type OutputFormat = 'table' | 'json' | 'csv';

/**
 * Column definition for table and CSV output
 */
export interface TableColumn<Row> {
  readonly header: string;
  readonly value: (row: Row) => string | number | null;
  readonly align?: 'left' | 'right';
}

function cellText<Row>(row: Row, column: TableColumn<Row>): string {
  const value = column.value(row);
  return value === null ? '' : String(value);
}

/**
 * Escape a value for CSV output
 */
export function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format rows as CSV with a header line and a trailing newline.
 * Null cells are written empty.
 */
export function formatCsv<Row>(rows: readonly Row[], columns: readonly TableColumn<Row>[]): string {
  const headerRow = columns.map((c) => escapeCsv(c.header)).join(',');
  const dataRows = rows.map((row) =>
    columns.map((col) => escapeCsv(cellText(row, col))).join(',')
  );
  return `${[headerRow, ...dataRows].join('\n')}\n`;
}

/**
 * Format rows as an aligned text table. Null cells print as '-'.
 */
export function formatTable<Row>(rows: readonly Row[], columns: readonly TableColumn<Row>[]): string {
  if (rows.length === 0) {
    return 'No rows.';
  }

  const text = rows.map((row) => columns.map((col) => cellText(row, col) || '-'));
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...text.map((cells) => cells[i].length))
  );

  const pad = (value: string, i: number): string =>
    columns[i].align === 'right' ? value.padStart(widths[i]) : value.padEnd(widths[i]);

  const headerRow = columns.map((col, i) => pad(col.header, i)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = text.map((cells) => cells.map((cell, i) => pad(cell, i)).join(' | '));

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Format rows in the requested output format
 */
export function formatOutput<Row>(
  rows: readonly Row[],
  format: OutputFormat,
  columns: readonly TableColumn<Row>[]
): string {
  switch (format) {
    case 'json':
      return JSON.stringify(
        rows.map((row) => Object.fromEntries(columns.map((col) => [col.header, col.value(row)]))),
        null,
        2
      );
    case 'csv':
      return formatCsv(rows, columns);
    case 'table':
    default:
      return formatTable(rows, columns);
  }
}
