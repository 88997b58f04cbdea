import { DEFAULTS } from './crawler.js';
import { ConfigError } from './errors.js';
import type { CrawlConfig } from './types.js';
import { isWebUrl, safeUrl } from './utils.js';

export const VERSION = '0.1.2';

export type RunConfig = {
  crawl: CrawlConfig & Required<Omit<CrawlConfig, 'startUrl'>>;
  outDir: string;
  userAgent: string;
  delayMs: number;
  bins: { pdffonts: string; pdftotext: string; verapdf: string };
};

export type CliCommand = { kind: 'run'; config: RunConfig } | { kind: 'help' } | { kind: 'version' };

type Env = Record<string, string | undefined>;

const BOOLEAN_FLAGS = {
  '--recursive': 'recursive',
  '--dry-run': 'dryRun',
  '--include-external-pdfs': 'includeExternalPdfs',
  '--include-external-pages': 'includeExternalPages',
  '--pdftotext': 'textDump',
  '--verapdf': 'conformance'
} as const;

const VALUE_FLAGS = ['--max-bytes', '--max-pages', '--timeout', '--out'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isBooleanFlag(flag: string): flag is keyof typeof BOOLEAN_FLAGS {
  return Object.hasOwn(BOOLEAN_FLAGS, flag);
}

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAGS.some((f) => f === flag);
}

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

function nonNegativeInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return n;
}

/**
 * Builds the run configuration from command-line arguments (without the node and
 * script entries) and the environment. Flags win over environment variables.
 */
export function loadConfig(argv: string[], env: Env = process.env): CliCommand {
  const flags: Partial<Record<(typeof BOOLEAN_FLAGS)[keyof typeof BOOLEAN_FLAGS], boolean>> = {};
  const values: Partial<Record<ValueFlag, string>> = {};
  let url: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--help' || arg === '-h') return { kind: 'help' };
    if (arg === '--version') return { kind: 'version' };

    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    if (isBooleanFlag(flag)) {
      flags[BOOLEAN_FLAGS[flag]] = true;
    } else if (isValueFlag(flag)) {
      const value = eq > 0 && flag !== arg ? arg.slice(eq + 1) : argv[++i];
      if (value === undefined || value.startsWith('--')) throw new ConfigError(`${flag} needs a value`);
      values[flag] = value;
    } else if (arg.startsWith('-')) {
      throw new ConfigError(`unknown option ${arg}`);
    } else if (url === undefined) {
      url = arg;
    } else {
      throw new ConfigError(`unexpected argument ${arg}`);
    }
  }

  if (!url) throw new ConfigError('missing start URL');
  const parsed = safeUrl(url);
  if (!parsed || !isWebUrl(parsed)) throw new ConfigError(`start URL must be an http(s) URL, got "${url}"`);

  const timeoutSec = positiveInt('--timeout', values['--timeout'] ?? env.TIMEOUT, DEFAULTS.timeoutMs / 1000);

  return {
    kind: 'run',
    config: {
      crawl: {
        startUrl: parsed.toString(),
        recursive: flags.recursive ?? false,
        dryRun: flags.dryRun ?? false,
        includeExternalPdfs: flags.includeExternalPdfs ?? false,
        includeExternalPages: flags.includeExternalPages ?? false,
        maxPages: positiveInt('--max-pages', values['--max-pages'] ?? env.MAX_PAGES, DEFAULTS.maxPages),
        maxBytes: positiveInt('--max-bytes', values['--max-bytes'] ?? env.MAX_BYTES, DEFAULTS.maxBytes),
        timeoutMs: timeoutSec * 1000,
        textDump: flags.textDump ?? false,
        conformance: flags.conformance ?? false
      },
      outDir: values['--out'] || env.OUT_DIR || 'out',
      userAgent: env.USER_AGENT || `pdf-a11y-triage/${VERSION}`,
      delayMs: nonNegativeInt('DELAY_MS', env.DELAY_MS, 0),
      bins: {
        pdffonts: env.PDFFONTS_BIN || 'pdffonts',
        pdftotext: env.PDFTOTEXT_BIN || 'pdftotext',
        verapdf: env.VERAPDF_BIN || 'verapdf'
      }
    }
  };
}

export const USAGE = `Usage: pdf-a11y-triage <url> [options]

Crawl a web page, find linked PDF files and triage them for accessibility:
text presence (image-only detection) and an optional PDF/UA check.

Options:
  --recursive               Follow links on the same site (default: off)
  --dry-run                 Discover PDFs but do not download or analyze them
  --include-external-pdfs   Also scan PDFs hosted on other domains when recursive
  --include-external-pages  Also follow page links to other domains when recursive
  --max-bytes N             Maximum size of a download in bytes (default: ${DEFAULTS.maxBytes})
  --max-pages N             Maximum pages to crawl with --recursive (default: ${DEFAULTS.maxPages})
  --timeout SECONDS         HTTP timeout (default: ${DEFAULTS.timeoutMs / 1000})
  --out DIR                 Output directory (default: ./out)
  --pdftotext               Dump extracted text when a text layer is found
  --verapdf                 Run veraPDF PDF/UA-1 checks (slower)
  --version                 Print the version
  -h, --help                Show this help

Examples:
  pdf-a11y-triage https://example.com/page
  pdf-a11y-triage --recursive https://example.com
  pdf-a11y-triage --verapdf https://example.com/docs

Env:
  MAX_PAGES MAX_BYTES TIMEOUT OUT_DIR USER_AGENT DELAY_MS
  PDFFONTS_BIN PDFTOTEXT_BIN VERAPDF_BIN`;
