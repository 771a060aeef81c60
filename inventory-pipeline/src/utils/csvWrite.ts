import * as fs from 'fs';
import * as path from 'path';

export function escapeCsvValue(value: string): string {
  if (value.includes(',') || value.includes('\n') || value.includes('\r') || value.includes('"')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

export function toCsv(header: readonly string[], rows: ReadonlyArray<Record<string, string>>): string {
  const lines: string[] = [header.map(escapeCsvValue).join(',')];
  for (const row of rows) {
    lines.push(header.map(col => escapeCsvValue(row[col] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}

export function writeCsv(filePath: string, header: readonly string[], rows: ReadonlyArray<Record<string, string>>): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, toCsv(header, rows));
}
