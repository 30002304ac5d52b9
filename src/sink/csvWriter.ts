/**
 * CSV output for harvested rows.
 */

import * as fs from 'fs';
import * as path from 'path';
import { RESULT_COLUMNS, ResultRow } from '../types';

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string | number): string {
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function rowsToCsv(rows: ResultRow[]): string {
  const lines = [RESULT_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(RESULT_COLUMNS.map((column) => escapeCsvField(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Write rows to a CSV file. An empty dataset still gets the header line.
 */
export function writeRowsCsv(rows: ResultRow[], filePath: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(filePath, rowsToCsv(rows), 'utf-8');

  if (rows.length === 0) {
    console.warn(`No data collected; wrote header only to ${filePath}`);
  } else {
    console.log(`Data saved to: ${filePath} (${rows.length} records)`);
  }
}
