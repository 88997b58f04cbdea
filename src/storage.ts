import fs from 'node:fs';
import path from 'node:path';
import { COLS, toRows, toStructured, type ReportRow } from './report.js';
import type { CrawlReport } from './types.js';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export function writeJson(filePath: string, data: unknown) {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

export function csvEscape(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  let s = String(value);
  const needsQuotes = /[",\n\r]/.test(s);
  if (needsQuotes) {
    s = '"' + s.replace(/"/g, '""') + '"';
  }
  return s;
}

export function toCsv(rows: ReportRow[]): string {
  const lines = [COLS.join(',')];
  for (const r of rows) {
    lines.push(COLS.map((k) => csvEscape(k === 'notes' ? r.notes.join('; ') : r[k])).join(','));
  }
  return lines.join('\n') + '\n';
}

export function writeReports(report: CrawlReport, runDir: string): { csvPath: string; jsonPath: string } {
  ensureDir(runDir);
  const csvPath = path.join(runDir, 'report.csv');
  const jsonPath = path.join(runDir, 'report.json');
  fs.writeFileSync(csvPath, toCsv(toRows(report)), 'utf-8');
  writeJson(jsonPath, toStructured(report));
  return { csvPath, jsonPath };
}
