import http from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { FetchError } from './errors.js';
import { HttpClient } from './http.js';

// Local in-process server standing in for the websites being crawled
let server: http.Server;
let base = '';

beforeAll(async () => {
  server = http.createServer((req, res) => {
    switch (req.url) {
      case '/page':
        res.writeHead(200, { 'content-type': 'text/html; charset=utf-8' });
        res.end('<a href="a.pdf">a</a>');
        return;
      case '/moved':
        res.writeHead(302, { location: '/page' });
        res.end();
        return;
      case '/doc.pdf':
        res.writeHead(200, { 'content-type': 'application/pdf', 'content-length': '12' });
        res.end('%PDF-1.7 abc');
        return;
      case '/big-declared.pdf':
        res.writeHead(200, { 'content-type': 'application/pdf', 'content-length': '5000' });
        res.end(Buffer.alloc(5000, 1));
        return;
      case '/big-chunked.pdf':
        // no content-length: the size is only known while streaming
        res.writeHead(200, { 'content-type': 'application/pdf' });
        res.write(Buffer.alloc(600, 1));
        res.end(Buffer.alloc(600, 1));
        return;
      case '/slow':
        setTimeout(() => {
          if (!res.destroyed) res.end('late');
        }, 1000);
        return;
      case '/agent':
        res.writeHead(200, { 'content-type': 'text/plain' });
        res.end(req.headers['user-agent'] ?? '');
        return;
      default:
        res.writeHead(404, { 'content-type': 'text/plain' });
        res.end('not found');
    }
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const addr = server.address();
  if (!addr || typeof addr === 'string') throw new Error('test server has no port');
  base = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

async function failure(promise: Promise<unknown>): Promise<FetchError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof FetchError) return err;
    throw err;
  }
  throw new Error('expected the fetch to fail');
}

describe('HttpClient', () => {
  it('returns the body with status and content type', async () => {
    const client = new HttpClient({ maxBytes: 1000 });
    const res = await client.fetch(`${base}/doc.pdf`);

    expect(res.statusCode).toBe(200);
    expect(res.contentType).toBe('application/pdf');
    expect(res.body.toString('utf-8')).toBe('%PDF-1.7 abc');
    expect(res.finalUrl).toBe(`${base}/doc.pdf`);
  });

  it('follows redirects and reports the final URL', async () => {
    const client = new HttpClient();
    const res = await client.fetch(`${base}/moved`);

    expect(res.finalUrl).toBe(`${base}/page`);
    expect(res.body.toString('utf-8')).toBe('<a href="a.pdf">a</a>');
  });

  it('fails with HttpError on non-2xx status', async () => {
    const err = await failure(new HttpClient().fetch(`${base}/missing.pdf`));

    expect(err.reason).toBe('HttpError');
    expect(err.statusCode).toBe(404);
    expect(err.message).toBe('HTTP 404');
  });

  it('refuses bodies whose declared length exceeds the ceiling', async () => {
    const err = await failure(new HttpClient({ maxBytes: 1000 }).fetch(`${base}/big-declared.pdf`));

    expect(err.reason).toBe('TooLarge');
    expect(err.message).toBe('exceeded max_bytes=1000 (declared 5000 bytes)');
  });

  it('aborts streamed bodies that pass the ceiling', async () => {
    const err = await failure(new HttpClient({ maxBytes: 1000 }).fetch(`${base}/big-chunked.pdf`));

    expect(err.reason).toBe('TooLarge');
  });

  it('times out slow responses', async () => {
    const err = await failure(new HttpClient({ timeoutMs: 100 }).fetch(`${base}/slow`));

    expect(err.reason).toBe('Timeout');
  });

  it('reports refused connections as network errors', async () => {
    const err = await failure(new HttpClient({ timeoutMs: 2000 }).fetch('http://127.0.0.1:1/unreachable'));

    expect(err.reason).toBe('NetworkError');
  });

  it('sends the configured user agent', async () => {
    const res = await new HttpClient({ userAgent: 'pdf-a11y-triage/test' }).fetch(`${base}/agent`);

    expect(res.body.toString('utf-8')).toBe('pdf-a11y-triage/test');
  });
});
