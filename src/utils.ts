import crypto from 'node:crypto';

export function sleep(ms: number) {
  return new Promise((res) => setTimeout(res, ms));
}

export function ensureAbsoluteUrl(baseUrl: string, href: string | undefined | null): string | null {
  if (!href) return null;
  try {
    const url = new URL(href.trim(), baseUrl);
    return url.toString();
  } catch {
    return null;
  }
}

export function safeUrl(input: string): URL | null {
  try {
    return new URL(input);
  } catch {
    return null;
  }
}

// Drops the fragment and sorts the raw query pairs so equivalent URLs compare equal.
// Pairs keep their original encoding: "?flag" stays "?flag" and "%20" stays "%20".
// WHATWG URL parsing already lower-cases scheme and host and strips default ports.
export function normalizeUrl(input: string): string | null {
  const u = safeUrl(input);
  if (!u) return null;
  u.hash = '';
  const pairs = u.search.slice(1).split('&').filter(Boolean).sort();
  u.search = pairs.length ? `?${pairs.join('&')}` : ''; // also drops a bare trailing "?"
  return u.toString();
}

export function isWebUrl(u: URL): boolean {
  return u.protocol === 'http:' || u.protocol === 'https:';
}

export function isPdfPath(urlStr: string): boolean {
  const u = safeUrl(urlStr);
  if (!u) return false;
  return /\.pdf$/i.test(u.pathname);
}

export function hostOf(urlStr: string): string | null {
  return safeUrl(urlStr)?.host ?? null;
}

export function sha256Hex(data: Buffer): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

// Deterministic file name for a downloaded PDF
export function pdfFilename(digest: string): string {
  return `${digest.slice(0, 16)}.pdf`;
}

export function isPdfContentType(contentType: string | null): boolean {
  return contentType?.toLowerCase().includes('application/pdf') ?? false;
}

export function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const lower = contentType.toLowerCase();
  return lower.includes('text/html') || lower.includes('application/xhtml+xml');
}
