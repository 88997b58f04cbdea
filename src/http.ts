import got, { RequestError, TimeoutError, type Response } from 'got';
import pLimit from 'p-limit';
import { FetchError } from './errors.js';
import type { FetchedResource } from './types.js';
import { sleep } from './utils.js';

type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
  maxBytes?: number;
  delayMs?: number;
  concurrency?: number;
};

export interface Fetcher {
  fetch(url: string): Promise<FetchedResource>;
}

export class HttpClient implements Fetcher {
  private client: typeof got;
  private limit: ReturnType<typeof pLimit>;
  private delayMs: number;
  private maxBytes: number;

  constructor(opts: HttpOptions = {}) {
    const { userAgent, timeoutMs, maxBytes, delayMs, concurrency } = opts;
    const headers = userAgent ? { 'user-agent': userAgent } : undefined;
    // No retries: a failed fetch is recorded, not repeated
    this.client = got.extend({
      followRedirect: true,
      retry: { limit: 0 },
      throwHttpErrors: false,
      timeout: { request: timeoutMs ?? 20000 },
      headers
    });
    this.limit = pLimit(Math.max(1, concurrency ?? 1));
    this.delayMs = Math.max(0, delayMs ?? 0);
    this.maxBytes = maxBytes ?? 50_000_000;
  }

  async fetch(url: string): Promise<FetchedResource> {
    return this.limit(async () => {
      if (this.delayMs) await sleep(this.delayMs);
      return this.transfer(url);
    });
  }

  private async transfer(url: string): Promise<FetchedResource> {
    const stream = this.client.stream(url);
    // got wraps errors passed to destroy(), so the reason is kept here instead
    const state: { response?: Response; failure?: FetchError } = {};

    stream.once('response', (res: Response) => {
      state.response = res;
      if (res.statusCode < 200 || res.statusCode > 299) {
        state.failure = new FetchError('HttpError', url, `HTTP ${res.statusCode}`, res.statusCode);
      } else {
        const declared = Number(res.headers['content-length']);
        if (Number.isFinite(declared) && declared > this.maxBytes) {
          state.failure = tooLarge(url, this.maxBytes, `declared ${declared} bytes`);
        }
      }
      if (state.failure) stream.destroy();
    });

    const chunks: Buffer[] = [];
    let total = 0;
    try {
      for await (const chunk of stream) {
        const buf = toBuffer(chunk);
        total += buf.length;
        if (total > this.maxBytes) {
          throw tooLarge(url, this.maxBytes, `received more than ${this.maxBytes} bytes`);
        }
        chunks.push(buf);
      }
    } catch (err) {
      stream.destroy();
      throw state.failure ?? toFetchError(url, err);
    }

    const { response, failure } = state;
    if (failure) throw failure;
    if (!response) {
      throw new FetchError('NetworkError', url, 'no response received');
    }
    const contentType = response.headers['content-type'];
    return {
      url,
      finalUrl: response.url || url,
      statusCode: response.statusCode,
      contentType: typeof contentType === 'string' ? contentType : null,
      body: Buffer.concat(chunks, total)
    };
  }
}

function tooLarge(url: string, maxBytes: number, detail: string): FetchError {
  return new FetchError('TooLarge', url, `exceeded max_bytes=${maxBytes} (${detail})`);
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk));
}

export function toFetchError(url: string, err: unknown): FetchError {
  if (err instanceof FetchError) return err;
  if (err instanceof TimeoutError) {
    return new FetchError('Timeout', url, `timed out: ${err.message}`);
  }
  if (err instanceof RequestError) {
    const code = err.code ? `${err.code}: ` : '';
    return new FetchError('NetworkError', url, `${code}${err.message}`);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new FetchError('NetworkError', url, message);
}
