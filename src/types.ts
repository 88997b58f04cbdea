export type CrawlConfig = {
  startUrl: string;
  recursive?: boolean; // follow same-site page links
  dryRun?: boolean; // discover PDFs without downloading them
  includeExternalPdfs?: boolean; // download PDFs hosted on other domains
  includeExternalPages?: boolean; // follow page links to other domains
  maxPages?: number; // hard cap on pages to visit
  maxBytes?: number; // per-fetch byte ceiling
  timeoutMs?: number;
  textDump?: boolean; // run pdftotext on PDFs with a text layer
  conformance?: boolean; // run veraPDF (PDF/UA-1)
};

export type CrawlState = 'Idle' | 'Running' | 'Completed' | 'Aborted';

export type CrawlTarget = {
  readonly url: string;
  readonly depth: number;
  readonly sourcePage: string | null;
};

export type PdfCandidate = {
  readonly url: string;
  readonly sourcePage: string;
  readonly order: number;
};

export type FetchedResource = {
  url: string;
  finalUrl: string;
  statusCode: number;
  contentType: string | null;
  body: Buffer;
};

export type TextVerdict = 'has_text' | 'image_only' | 'unknown';

export type ConformanceOutcome = 'pass' | 'fail' | 'error';

export type FailureReason =
  | 'NetworkError'
  | 'Timeout'
  | 'TooLarge'
  | 'HttpError'
  | 'ToolInvocationError'
  | 'ToolOutputUnparseable';

export type FindingStatus = 'ok' | 'skipped' | `error:${FailureReason}`;

export type TextDump = {
  path: string;
  chars: number;
  bytes: number;
  density: number | null; // text bytes / pdf bytes
};

export type PdfFinding = {
  readonly order: number;
  readonly pdfUrl: string;
  readonly sourcePage: string;
  readonly httpStatus: number | null;
  readonly contentType: string | null;
  readonly bytes: number | null;
  readonly sha256: string | null;
  readonly verdict: TextVerdict;
  readonly fontCount: number | null;
  readonly conformance: ConformanceOutcome | null;
  readonly textDump: TextDump | null;
  readonly notes: readonly string[];
  readonly status: FindingStatus;
};

// A downloaded PDF as handed to the external tools
export type StoredPdf = {
  path: string;
  bytes: Buffer;
};

export type FontReport = {
  fontCount: number;
};

export type ConformanceResult = {
  outcome: ConformanceOutcome;
  note: string | null;
};

export type ExtractedText = {
  path: string;
  chars: number;
  bytes: number;
};

export type ReportTotals = {
  pdfs: number;
  byVerdict: Record<TextVerdict, number>;
  byStatus: Partial<Record<FindingStatus, number>>;
};

export type RunOptions = Required<Omit<CrawlConfig, 'startUrl'>>;

export type RunMetadata = {
  startUrl: string;
  startedAt: string; // ISO 8601
  finishedAt: string;
  state: CrawlState;
  options: RunOptions;
  pagesVisited: number;
  pagesFailed: number;
  pageLimitReached: boolean;
};

export type CrawlReport = RunMetadata & {
  totals: ReportTotals;
  findings: readonly PdfFinding[];
};
