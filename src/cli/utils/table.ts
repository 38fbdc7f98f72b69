import Table from 'cli-table3';
import chalk from 'chalk';

export const OUTPUT_FORMATS = ['table', 'json', 'csv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Narrow a user-supplied format name
 */
export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Create a table of result rows
 */
export function createRowsTable(rows: readonly string[][]): string {
  const table = new Table({
    style: {
      head: [],
      border: [],
    },
  });

  for (const row of rows) {
    table.push([...row]);
  }

  return table.toString();
}

/**
 * Footer line with the row count
 */
export function createRowCountSummary(count: number): string {
  return chalk.dim(`(${count} row${count === 1 ? '' : 's'})`);
}

function csvEscape(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render rows as CSV, one line per row
 */
export function formatCsv(rows: readonly string[][]): string {
  return rows.map((row) => row.map(csvEscape).join(',')).join('\n');
}

/**
 * Render rows in the requested format
 */
export function formatRows(rows: readonly string[][], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(rows, null, 2);
    case 'csv':
      return formatCsv(rows);
    case 'table':
      return rows.length === 0
        ? 'No results.'
        : `${createRowsTable(rows)}\n${createRowCountSummary(rows.length)}`;
  }
}
