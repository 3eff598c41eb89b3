import { Agent, interceptors, type Dispatcher } from 'undici';
import type pino from 'pino';
import { brotliDecompressSync, gunzipSync, inflateSync } from 'zlib';
import { getEnvironment } from '../../config/environment';
import { BROWSER_USER_AGENT } from '../../config/constants';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { isHttpUrl } from '../../utils/urlValidator';
import { NetworkError, TimeoutError } from '../errors';

const { redirect } = interceptors;

export interface FetchOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Rejects bodies larger than this many bytes (checked on header and on body). */
  maxBytes?: number;
  accept?: string;
}

export interface HttpResponse {
  statusCode: number;
  bodyText: string;
}

/** The HTTP capability the discoverer and the extraction engine depend on. */
export interface HttpFetcher {
  fetch(url: string, options?: FetchOptions): Promise<HttpResponse>;
}

export interface HttpClientOptions {
  connections?: number;
  defaultTimeoutMs?: number;
  correlationId?: string;
}

const DEFAULT_ACCEPT =
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function decompress(buf: Buffer, encoding: string): Buffer {
  if (encoding.includes('br')) return brotliDecompressSync(buf);
  if (encoding.includes('gzip')) return gunzipSync(buf);
  if (encoding.includes('deflate')) return inflateSync(buf);
  return buf;
}

/**
 * Connection-pooled HTTP client shared by every task of one scrape.
 * Non-2xx statuses are returned, not thrown; timeouts and connection failures throw.
 */
export class HttpClient implements HttpFetcher {
  private readonly agent: Agent;
  private readonly dispatcher: Dispatcher;
  private readonly defaultTimeoutMs: number;
  private readonly log: pino.Logger;

  constructor(options: HttpClientOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? getEnvironment().REQUEST_TIMEOUT_MS;
    this.agent = new Agent({ connections: options.connections ?? 10 });
    this.dispatcher = this.agent.compose(redirect({ maxRedirections: 3 }));
    this.log = createChildLogger(options.correlationId ?? generateCorrelationId('http'));
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<HttpResponse> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    if (!isHttpUrl(url)) {
      throw new NetworkError('Only http(s) schemes are allowed');
    }
    options.signal?.throwIfAborted();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const signal = options.signal
      ? AbortSignal.any([options.signal, controller.signal])
      : controller.signal;

    const headers: Record<string, string> = {
      'accept-language': 'en-US,en;q=0.9',
      'accept-encoding': 'gzip, br, deflate',
      'user-agent': BROWSER_USER_AGENT,
      accept: options.accept ?? DEFAULT_ACCEPT,
      dnt: '1',
      connection: 'keep-alive',
      'upgrade-insecure-requests': '1',
      'cache-control': 'max-age=0',
    };

    try {
      const { origin, pathname, search } = new URL(url);
      const res = await this.dispatcher.request({
        origin,
        path: pathname + search,
        method: 'GET',
        headers,
        signal,
      });

      const declaredLength = Number(headerValue(res.headers['content-length']) ?? NaN);
      if (options.maxBytes !== undefined && declaredLength > options.maxBytes) {
        await res.body.dump();
        throw new NetworkError(`Response too large (${declaredLength} bytes)`, res.statusCode);
      }

      const encoding = (headerValue(res.headers['content-encoding']) ?? '').toLowerCase();
      const raw = Buffer.from(await res.body.arrayBuffer());
      const buf = decompress(raw, encoding);

      if (options.maxBytes !== undefined && buf.length > options.maxBytes) {
        throw new NetworkError(`Response too large (${buf.length} bytes)`, res.statusCode);
      }

      this.log.debug(
        { event: 'http_fetch', url, statusCode: res.statusCode, bytes: buf.length, encoding },
        'HTTP request completed'
      );

      return { statusCode: res.statusCode, bodyText: buf.toString('utf8') };
    } catch (err) {
      if (timedOut) {
        throw new TimeoutError('Request timed out', timeoutMs);
      }
      if (options.signal?.aborted) {
        throw err;
      }
      if (err instanceof NetworkError) {
        throw err;
      }
      throw new NetworkError(err instanceof Error ? err.message : 'Request failed', undefined, {
        cause: err,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    try {
      await this.agent.close();
      this.log.debug({ event: 'http_client_closed' }, 'HTTP client closed');
    } catch (error) {
      this.log.warn({ event: 'http_client_close_failed', error }, 'HTTP client close failed');
    }
  }
}
