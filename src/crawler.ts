import { ConfigError, errorMessage } from './errors.js';
import type { Fetcher } from './http.js';
import { extractLinks } from './links.js';
import type { PdfClassifier } from './classifier.js';
import { ReportAggregator } from './report.js';
import type {
  CrawlConfig,
  CrawlReport,
  CrawlState,
  CrawlTarget,
  FetchedResource,
  PdfCandidate,
  PdfFinding,
  RunOptions
} from './types.js';
import { hostOf, isHtmlContentType, isPdfContentType, normalizeUrl } from './utils.js';

export const DEFAULTS = {
  maxPages: 200,
  maxBytes: 50_000_000,
  timeoutMs: 20_000
} as const;

export const EXTERNAL_DOMAIN_NOTE = 'external domain';
export const DRY_RUN_NOTE = 'dry-run (not downloaded)';

export type CrawlerDeps = {
  fetcher: Fetcher;
  classifier: PdfClassifier;
  now?: () => Date;
};

export class Crawler {
  private startUrl: string;
  private cfg: RunOptions;
  private fetcher: Fetcher;
  private classifier: PdfClassifier;
  private now: () => Date;

  private state: CrawlState = 'Idle';
  private queue: CrawlTarget[] = [];
  private queued = new Set<string>();
  private visited = new Set<string>();
  private seenPdfs = new Set<string>();
  private scopeHosts = new Set<string>();
  private report = new ReportAggregator();
  private pagesFailed = 0;
  private pageLimitReached = false;

  constructor(cfg: CrawlConfig, deps: CrawlerDeps) {
    const startUrl = normalizeUrl(cfg.startUrl);
    if (!startUrl) throw new ConfigError(`invalid start URL: ${cfg.startUrl}`);
    this.startUrl = startUrl;
    this.cfg = {
      recursive: cfg.recursive ?? false,
      dryRun: cfg.dryRun ?? false,
      includeExternalPdfs: cfg.includeExternalPdfs ?? false,
      includeExternalPages: cfg.includeExternalPages ?? false,
      maxPages: cfg.maxPages ?? DEFAULTS.maxPages,
      maxBytes: cfg.maxBytes ?? DEFAULTS.maxBytes,
      timeoutMs: cfg.timeoutMs ?? DEFAULTS.timeoutMs,
      textDump: cfg.textDump ?? false,
      conformance: cfg.conformance ?? false
    };
    if (!Number.isInteger(this.cfg.maxPages) || this.cfg.maxPages < 1) {
      throw new ConfigError(`maxPages must be a positive integer, got ${this.cfg.maxPages}`);
    }
    this.fetcher = deps.fetcher;
    this.classifier = deps.classifier;
    this.now = deps.now ?? (() => new Date());
  }

  get currentState(): CrawlState {
    return this.state;
  }

  /**
   * Crawls breadth-first from the start URL and returns the finalized report.
   *
   * Page and PDF failures are recorded and the crawl goes on. Only an unreachable
   * start page aborts the run, with a `ConfigError`.
   */
  async run(startedAt: Date = this.now()): Promise<CrawlReport> {
    if (this.state !== 'Idle') throw new Error(`crawler already ${this.state.toLowerCase()}`);
    this.state = 'Running';
    const { startUrl } = this;
    const startHost = hostOf(startUrl);
    if (startHost) this.scopeHosts.add(startHost);

    this.enqueue({ url: startUrl, depth: 0, sourcePage: null });

    while (this.queue.length && this.visited.size < this.pageCeiling()) {
      const target = this.queue.shift();
      if (!target || this.visited.has(target.url)) continue;
      // Marked before the fetch so the page can never be queued again
      this.visited.add(target.url);
      console.log(`[crawl] page ${this.visited.size}: ${target.url}`);

      let page: FetchedResource;
      try {
        page = await this.fetcher.fetch(target.url);
      } catch (err) {
        if (target.url === startUrl) {
          this.state = 'Aborted';
          throw new ConfigError(`start URL unreachable: ${startUrl} (${errorMessage(err)})`);
        }
        this.pagesFailed++;
        console.warn(`[crawl] fail: ${target.url}: ${errorMessage(err)}`);
        continue;
      }
      if (target.url === startUrl) {
        const finalHost = hostOf(page.finalUrl);
        if (finalHost) this.scopeHosts.add(finalHost);
      }
      if (isPdfContentType(page.contentType)) {
        await this.recordServedPdf(target, page);
        continue;
      }
      if (!isHtmlContentType(page.contentType)) {
        console.log(`[crawl] not HTML (${page.contentType ?? 'no content-type'}): ${target.url}`);
        continue;
      }

      const { pdfLinks, pageLinks } = extractLinks(page.body, page.finalUrl);

      for (const pdfUrl of pdfLinks) {
        if (this.seenPdfs.has(pdfUrl)) continue;
        this.seenPdfs.add(pdfUrl);
        const candidate: PdfCandidate = { url: pdfUrl, sourcePage: target.url, order: this.seenPdfs.size };
        this.report.append(await this.triage(candidate));
      }

      if (this.singlePage()) continue;
      for (const link of pageLinks) {
        if (this.visited.has(link) || this.queued.has(link)) continue;
        if (!this.cfg.includeExternalPages && !this.inScope(link)) continue;
        if (this.visited.size + this.queue.length >= this.pageCeiling()) {
          this.pageLimitReached = true;
          continue;
        }
        this.enqueue({ url: link, depth: target.depth + 1, sourcePage: target.url });
      }
    }

    this.state = 'Completed';
    if (this.pageLimitReached) {
      console.log(`[crawl] page limit of ${this.cfg.maxPages} reached`);
    }
    return this.report.finalize({
      startUrl,
      startedAt: startedAt.toISOString(),
      finishedAt: this.now().toISOString(),
      state: this.state,
      options: { ...this.cfg },
      pagesVisited: this.visited.size,
      pagesFailed: this.pagesFailed,
      pageLimitReached: this.pageLimitReached
    });
  }

  // A recursive crawl capped at one page is a single-page scan
  private singlePage(): boolean {
    return !this.cfg.recursive || this.cfg.maxPages === 1;
  }

  private pageCeiling(): number {
    return this.singlePage() ? 1 : this.cfg.maxPages;
  }

  private enqueue(target: CrawlTarget) {
    this.queued.add(target.url);
    this.queue.push(target);
  }

  private inScope(url: string): boolean {
    const host = hostOf(url);
    return host !== null && this.scopeHosts.has(host);
  }

  // A page link whose response turned out to be a PDF
  private async recordServedPdf(target: CrawlTarget, resource: FetchedResource) {
    if (this.seenPdfs.has(target.url)) return;
    this.seenPdfs.add(target.url);
    const candidate: PdfCandidate = {
      url: target.url,
      sourcePage: target.sourcePage ?? target.url,
      order: this.seenPdfs.size
    };
    if (this.cfg.dryRun) {
      console.log(`[pdf] ${candidate.order} discovered (dry-run): ${candidate.url}`);
      this.report.append(this.classifier.skipped(candidate, DRY_RUN_NOTE));
      return;
    }
    const finding = await this.classifier.classify(resource, candidate);
    console.log(`[pdf] ${candidate.order} ${finding.status} ${finding.verdict}: ${candidate.url}`);
    this.report.append(finding);
  }

  private async triage(candidate: PdfCandidate): Promise<PdfFinding> {
    if (this.cfg.dryRun) {
      console.log(`[pdf] ${candidate.order} discovered (dry-run): ${candidate.url}`);
      return this.classifier.skipped(candidate, DRY_RUN_NOTE);
    }
    // A single-page scan takes every PDF on that page
    if (!this.singlePage() && !this.cfg.includeExternalPdfs && !this.inScope(candidate.url)) {
      console.log(`[pdf] ${candidate.order} skip external: ${candidate.url}`);
      return this.classifier.skipped(candidate, EXTERNAL_DOMAIN_NOTE);
    }

    let download: FetchedResource;
    try {
      download = await this.fetcher.fetch(candidate.url);
    } catch (err) {
      console.warn(`[pdf] ${candidate.order} fail: ${candidate.url}: ${errorMessage(err)}`);
      return this.classifier.failed(candidate, err);
    }
    const finding = await this.classifier.classify(download, candidate);
    console.log(`[pdf] ${candidate.order} ${finding.status} ${finding.verdict}: ${candidate.url}`);
    return finding;
  }
}
