/**
 * Safe CSV Reading Utility
 *
 * Handles:
 * - Quoted commas and multiline fields (via csv-parse)
 * - BOM removal
 * - Ragged rows from spreadsheet exports
 * - Consistent error handling
 */

import { readFileSync, existsSync } from 'fs';
import { parse } from 'csv-parse/sync';
import { isRecord } from './json.js';

export interface CsvRow {
  [key: string]: string;
}

export interface CsvReadOptions {
  /** Trim whitespace from values */
  trim?: boolean;
}

function toCsvRow(record: Record<string, unknown>): CsvRow {
  const row: CsvRow = {};
  for (const [key, value] of Object.entries(record)) {
    row[key] = value === undefined || value === null ? '' : String(value);
  }
  return row;
}

/**
 * Parse CSV text with a header row into records keyed by column name.
 */
export function parseCsv(content: string, options: CsvReadOptions = {}): CsvRow[] {
  const records: unknown = parse(content, {
    columns: (header: string[]) => header.map(h => h.trim()),
    bom: true,
    skip_empty_lines: true,
    relax_quotes: true,
    relax_column_count: true,
    trim: options.trim !== false,
  });

  if (!Array.isArray(records)) return [];
  return records.filter(isRecord).map(toCsvRow);
}

/**
 * Safely read a CSV file; a missing or unparseable file yields no rows.
 */
export function readCsvSafe(filePath: string, options: CsvReadOptions = {}): CsvRow[] {
  if (!existsSync(filePath)) {
    console.warn(`⚠️  CSV file not found: ${filePath}`);
    return [];
  }

  try {
    return parseCsv(readFileSync(filePath, 'utf-8'), options);
  } catch (error) {
    console.error(`❌ Error parsing CSV ${filePath}:`, error);
    return [];
  }
}

/**
 * Get a value from a row with multiple possible column names
 */
export function getColumn(row: CsvRow, ...names: string[]): string {
  for (const name of names) {
    const value = row[name];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return '';
}
