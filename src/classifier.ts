import fs from 'node:fs';
import path from 'node:path';
import { FetchError, ToolError, errorMessage } from './errors.js';
import type { ConformanceChecker, TextExtractor, TextInspector } from './tools.js';
import type {
  ConformanceOutcome,
  FetchedResource,
  FindingStatus,
  PdfCandidate,
  PdfFinding,
  StoredPdf,
  TextDump,
  TextVerdict
} from './types.js';
import { pdfFilename, sha256Hex } from './utils.js';

export type ClassifierOptions = {
  pdfDir: string; // downloaded PDFs are kept here for review
  inspector: TextInspector;
  textExtractor?: TextExtractor | null;
  conformanceChecker?: ConformanceChecker | null;
};

export class PdfClassifier {
  private pdfDir: string;
  private inspector: TextInspector;
  private textExtractor: TextExtractor | null;
  private conformanceChecker: ConformanceChecker | null;

  constructor(opts: ClassifierOptions) {
    this.pdfDir = opts.pdfDir;
    this.inspector = opts.inspector;
    this.textExtractor = opts.textExtractor ?? null;
    this.conformanceChecker = opts.conformanceChecker ?? null;
  }

  async classify(download: FetchedResource, candidate: PdfCandidate): Promise<PdfFinding> {
    const notes: string[] = [];
    const sha256 = sha256Hex(download.body);
    const base = {
      order: candidate.order,
      pdfUrl: candidate.url,
      sourcePage: candidate.sourcePage,
      httpStatus: download.statusCode,
      contentType: download.contentType,
      bytes: download.body.length,
      sha256
    };

    if (download.contentType && !download.contentType.toLowerCase().includes('application/pdf')) {
      notes.push(`unexpected content-type ${download.contentType}`);
    }

    let pdf: StoredPdf;
    try {
      pdf = await this.store(download.body, sha256);
    } catch (err) {
      notes.push(`could not store PDF: ${errorMessage(err)}`);
      return { ...base, ...unknownResult(), notes, status: 'error:ToolInvocationError' };
    }

    let verdict: TextVerdict = 'unknown';
    let fontCount: number | null = null;
    let status: FindingStatus = 'ok';
    try {
      const report = await this.inspector.inspectText(pdf);
      fontCount = report.fontCount;
      verdict = fontCount > 0 ? 'has_text' : 'image_only';
    } catch (err) {
      notes.push(errorMessage(err));
      status = err instanceof ToolError ? `error:${err.reason}` : 'error:ToolInvocationError';
    }

    let textDump: TextDump | null = null;
    if (this.textExtractor && verdict === 'has_text') {
      try {
        const text = await this.textExtractor.extractText(pdf);
        textDump = { ...text, density: pdf.bytes.length ? text.bytes / pdf.bytes.length : null };
      } catch (err) {
        notes.push(`pdftotext failed: ${errorMessage(err)}`);
      }
    }

    let conformance: ConformanceOutcome | null = null;
    if (this.conformanceChecker) {
      try {
        const result = await this.conformanceChecker.checkConformance(pdf);
        conformance = result.outcome;
        if (result.note) notes.push(result.note);
      } catch (err) {
        conformance = 'error';
        notes.push(`verapdf failed: ${errorMessage(err)}`);
      }
    }

    if (verdict === 'image_only') {
      notes.push('no fonts found: likely scanned or image-only');
    }

    return { ...base, verdict, fontCount, conformance, textDump, notes, status };
  }

  // Finding for a PDF whose download failed
  failed(candidate: PdfCandidate, err: unknown): PdfFinding {
    const fetchErr = err instanceof FetchError ? err : null;
    return {
      order: candidate.order,
      pdfUrl: candidate.url,
      sourcePage: candidate.sourcePage,
      httpStatus: fetchErr?.statusCode ?? null,
      contentType: null,
      bytes: null,
      sha256: null,
      ...unknownResult(),
      notes: [errorMessage(err)],
      status: `error:${fetchErr?.reason ?? 'NetworkError'}`
    };
  }

  // Finding for a PDF that is recorded but never downloaded
  skipped(candidate: PdfCandidate, note: string): PdfFinding {
    return {
      order: candidate.order,
      pdfUrl: candidate.url,
      sourcePage: candidate.sourcePage,
      httpStatus: null,
      contentType: null,
      bytes: null,
      sha256: null,
      ...unknownResult(),
      notes: [note],
      status: 'skipped'
    };
  }

  private async store(bytes: Buffer, sha256: string): Promise<StoredPdf> {
    await fs.promises.mkdir(this.pdfDir, { recursive: true });
    const outPath = path.join(this.pdfDir, pdfFilename(sha256));
    await fs.promises.writeFile(outPath, bytes);
    return { path: outPath, bytes };
  }
}

function unknownResult() {
  return {
    verdict: 'unknown' as const,
    fontCount: null,
    conformance: null,
    textDump: null
  };
}
