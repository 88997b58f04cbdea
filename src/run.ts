import { PdfClassifier } from './classifier.js';
import type { RunConfig } from './config.js';
import { Crawler } from './crawler.js';
import { HttpClient } from './http.js';
import { pdfDir, runDir } from './paths.js';
import { writeReports } from './storage.js';
import { PdfFontsInspector, PdfToTextExtractor, VeraPdfChecker } from './tools.js';
import type { CrawlReport } from './types.js';

export type RunResult = {
  report: CrawlReport;
  runDir: string;
  csvPath: string;
  jsonPath: string;
};

// Wires the real HTTP client and poppler/veraPDF tools into one crawl and writes the reports
export async function runTriage(config: RunConfig, startedAt = new Date()): Promise<RunResult> {
  const { crawl, bins } = config;
  const dir = runDir(config.outDir, startedAt);

  const http = new HttpClient({
    userAgent: config.userAgent,
    timeoutMs: crawl.timeoutMs,
    maxBytes: crawl.maxBytes,
    delayMs: config.delayMs,
    concurrency: 1
  });
  const classifier = new PdfClassifier({
    pdfDir: pdfDir(dir),
    inspector: new PdfFontsInspector(bins.pdffonts),
    textExtractor: crawl.textDump ? new PdfToTextExtractor(bins.pdftotext) : null,
    conformanceChecker: crawl.conformance ? new VeraPdfChecker(bins.verapdf) : null
  });
  const crawler = new Crawler(crawl, { fetcher: http, classifier });

  console.log(`[crawl] start: ${crawl.startUrl}${crawl.recursive ? ` (recursive, max ${crawl.maxPages} pages)` : ''}`);
  const report = await crawler.run(startedAt);
  const { csvPath, jsonPath } = writeReports(report, dir);
  console.log(`[report] wrote ${report.findings.length} rows to ${dir}`);
  return { report, runDir: dir, csvPath, jsonPath };
}
