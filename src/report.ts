import type { CrawlReport, PdfFinding, ReportTotals, RunMetadata } from './types.js';

// Column order for the tabular report
export const COLS = [
  'order',
  'source_page',
  'pdf_url',
  'verdict',
  'font_count',
  'conformance',
  'status',
  'notes',
  'http_status',
  'content_type',
  'bytes',
  'sha256',
  'text_path',
  'text_chars',
  'text_bytes',
  'text_density'
] as const;

export type Column = (typeof COLS)[number];
type Cell = string | number | null;
export type ReportRow = { [K in Exclude<Column, 'notes'>]: Cell } & { notes: string[] };

export type StructuredReport = {
  run: RunMetadata & { totals: ReportTotals };
  findings: ReportRow[];
};

export class ReportAggregator {
  private findings: PdfFinding[] = [];
  private seen = new Set<PdfFinding>();
  private finalized = false;

  append(finding: PdfFinding): void {
    if (this.finalized) throw new Error('report already finalized');
    if (this.seen.has(finding)) return;
    this.seen.add(finding);
    this.findings.push(
      Object.freeze({
        ...finding,
        notes: Object.freeze([...finding.notes]),
        textDump: finding.textDump && Object.freeze({ ...finding.textDump })
      })
    );
  }

  get size(): number {
    return this.findings.length;
  }

  finalize(meta: RunMetadata): CrawlReport {
    if (this.finalized) throw new Error('report already finalized');
    this.finalized = true;
    const findings = Object.freeze([...this.findings]);
    return { ...meta, totals: computeTotals(findings), findings };
  }
}

export function computeTotals(findings: readonly PdfFinding[]): ReportTotals {
  const totals: ReportTotals = {
    pdfs: findings.length,
    byVerdict: { has_text: 0, image_only: 0, unknown: 0 },
    byStatus: {}
  };
  for (const f of findings) {
    totals.byVerdict[f.verdict]++;
    totals.byStatus[f.status] = (totals.byStatus[f.status] ?? 0) + 1;
  }
  return totals;
}

export function toRow(f: PdfFinding): ReportRow {
  return {
    order: f.order,
    source_page: f.sourcePage,
    pdf_url: f.pdfUrl,
    verdict: f.verdict,
    font_count: f.fontCount,
    conformance: f.conformance,
    status: f.status,
    notes: [...f.notes],
    http_status: f.httpStatus,
    content_type: f.contentType,
    bytes: f.bytes,
    sha256: f.sha256,
    text_path: f.textDump?.path ?? null,
    text_chars: f.textDump?.chars ?? null,
    text_bytes: f.textDump?.bytes ?? null,
    text_density: f.textDump?.density ?? null
  };
}

export function toRows(report: CrawlReport): ReportRow[] {
  return report.findings.map(toRow);
}

export function toStructured(report: CrawlReport): StructuredReport {
  const { findings, ...run } = report;
  return { run, findings: findings.map(toRow) };
}
