import { describe, expect, it } from 'vitest';
import { extractLinks } from './links.js';

describe('extractLinks', () => {
  it('resolves relative links and splits PDFs from pages', () => {
    const html = `
      <a href="report.pdf">Report</a>
      <a href="/files/Scan.PDF">Scan</a>
      <a href="../about">About</a>
      <a href="https://other.org/page?b=2&a=1#top">Other</a>`;
    const { pdfLinks, pageLinks } = extractLinks(html, 'https://example.com/docs/index.html');

    expect([...pdfLinks]).toEqual(['https://example.com/docs/report.pdf', 'https://example.com/files/Scan.PDF']);
    expect([...pageLinks]).toEqual(['https://example.com/about', 'https://other.org/page?a=1&b=2']);
  });

  it('normalizes fragments and duplicate links away', () => {
    const html = `
      <a href="a.pdf">1</a>
      <a href="a.pdf#page=3">2</a>
      <a href="HTTPS://EXAMPLE.COM:443/a.pdf">3</a>
      <a href="list?x=1&y=2">4</a>
      <a href="list?y=2&x=1#more">5</a>`;
    const { pdfLinks, pageLinks } = extractLinks(html, 'https://example.com/');

    expect([...pdfLinks]).toEqual(['https://example.com/a.pdf']);
    expect([...pageLinks]).toEqual(['https://example.com/list?x=1&y=2']);
  });

  it('treats links declared as application/pdf as PDFs', () => {
    const html = '<a href="/download?id=7" type="application/pdf">Minutes</a>';
    const { pdfLinks, pageLinks } = extractLinks(html, 'https://example.com/');

    expect([...pdfLinks]).toEqual(['https://example.com/download?id=7']);
    expect(pageLinks.size).toBe(0);
  });

  it('keeps the encoding of query strings', () => {
    const { pdfLinks } = extractLinks('<a href="dl.pdf?download">D</a> <a href="f.pdf?name=a%20b">F</a>', 'https://example.com/');
    expect([...pdfLinks]).toEqual(['https://example.com/dl.pdf?download', 'https://example.com/f.pdf?name=a%20b']);
  });

  it('keeps a .pdf path with a query string as a PDF', () => {
    const { pdfLinks } = extractLinks('<a href="/flyer.pdf?v=2">Flyer</a>', 'https://example.com/');
    expect([...pdfLinks]).toEqual(['https://example.com/flyer.pdf?v=2']);
  });

  it('ignores non-web schemes and empty hrefs', () => {
    const html = `
      <a href="mailto:office@example.com">mail</a>
      <a href="javascript:void(0)">js</a>
      <a href="tel:+100">call</a>
      <a href="">empty</a>
      <a>no href</a>
      <a href="ftp://example.com/file.pdf">ftp</a>`;
    const { pdfLinks, pageLinks } = extractLinks(html, 'https://example.com/');

    expect(pdfLinks.size).toBe(0);
    expect(pageLinks.size).toBe(0);
  });

  it('honours a base element', () => {
    const html = '<html><head><base href="https://cdn.example.com/assets/"></head><body><a href="guide.pdf">g</a></body></html>';
    const { pdfLinks } = extractLinks(html, 'https://example.com/page');

    expect([...pdfLinks]).toEqual(['https://cdn.example.com/assets/guide.pdf']);
  });

  it('reads image map areas', () => {
    const html = '<map name="m"><area href="/map.pdf" shape="rect" coords="0,0,1,1"></map>';
    const { pdfLinks } = extractLinks(html, 'https://example.com/');

    expect([...pdfLinks]).toEqual(['https://example.com/map.pdf']);
  });

  it('survives malformed markup', () => {
    const html = '<div><a href="ok.pdf">ok<p><a href="http://[bad">bad</a></div></span><a href="next"';
    const { pdfLinks, pageLinks } = extractLinks(Buffer.from(html), 'https://example.com/');

    expect([...pdfLinks]).toEqual(['https://example.com/ok.pdf']);
    expect([...pageLinks]).toEqual([]);
  });
});
