import * as cheerio from 'cheerio';
import { ensureAbsoluteUrl, isPdfPath, isWebUrl, normalizeUrl, safeUrl } from './utils.js';

export type ExtractedLinks = {
  pdfLinks: Set<string>;
  pageLinks: Set<string>;
};

/**
 * Splits the hyperlinks of an HTML document into PDF links and page links.
 *
 * Every href is resolved against `<base href>` (when present) or `baseUrl` and
 * normalized, so both sets hold absolute, fragment-free URLs in document order.
 * Links that cannot be resolved, and non-web schemes such as `mailto:`, are skipped.
 */
export function extractLinks(html: string | Buffer, baseUrl: string): ExtractedLinks {
  const pdfLinks = new Set<string>();
  const pageLinks = new Set<string>();

  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(typeof html === 'string' ? html : html.toString('utf-8'));
  } catch (err) {
    console.warn(`[links] unparseable document at ${baseUrl}: ${String(err)}`);
    return { pdfLinks, pageLinks };
  }

  const declaredBase = $('base[href]').first().attr('href');
  const base = ensureAbsoluteUrl(baseUrl, declaredBase) ?? baseUrl;

  $('a[href], area[href]').each((_, el) => {
    const abs = ensureAbsoluteUrl(base, $(el).attr('href'));
    if (!abs) return;
    const u = safeUrl(abs);
    if (!u || !isWebUrl(u)) return;
    const normalized = normalizeUrl(abs);
    if (!normalized) return;

    const declaredType = ($(el).attr('type') ?? '').trim().toLowerCase();
    if (isPdfPath(normalized) || declaredType.startsWith('application/pdf')) {
      pdfLinks.add(normalized);
    } else {
      pageLinks.add(normalized);
    }
  });

  return { pdfLinks, pageLinks };
}
