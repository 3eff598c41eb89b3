import { z } from 'zod';
import type pino from 'pino';
import { DEFAULT_MAX_ITEMS } from '../config/constants';
import { getEnvironment } from '../config/environment';
import { createChildLogger, generateCorrelationId, withTiming } from '../utils/logger';
import { isHttpUrl } from '../utils/urlValidator';
import { ContentProcessor } from './content/contentProcessor';
import { ExtractionEngine } from './content/extractionEngine';
import { createStrategyPool, type StrategyPool } from './content/strategyPool';
import { UrlDiscoverer } from './discovery/urlDiscoverer';
import { ConfigurationError, RenderError, errorMessage, toScraperError } from './errors';
import { HttpClient, type HttpFetcher } from './http/httpClient';
import { PlaywrightRenderer } from './render/playwrightRenderer';
import type { Renderer } from './render/types';
import type { ScrapeResult } from './types';

const ScrapeOptionsSchema = z.object({
  baseUrl: z
    .string()
    .trim()
    .min(1, 'baseUrl is required')
    .refine(isHttpUrl, 'baseUrl must be an absolute http(s) URL'),
  maxItems: z.number().int().positive().default(DEFAULT_MAX_ITEMS),
  useBrowser: z.boolean().default(false),
  maxConcurrent: z.number().int().positive().optional(),
  chunkSize: z.number().int().positive().optional(),
});

export type ScrapeOptions = z.input<typeof ScrapeOptionsSchema> & { signal?: AbortSignal };
type ResolvedOptions = z.output<typeof ScrapeOptionsSchema>;

export interface ClosableHttpFetcher extends HttpFetcher {
  close(): Promise<void>;
}

/** Resource factories; everything they return is released when the scrape ends. */
export interface ScraperOverrides {
  createHttpClient?: (log: pino.Logger, connections: number) => ClosableHttpFetcher;
  createStrategyPool?: (log: pino.Logger) => StrategyPool;
  launchRenderer?: (log: pino.Logger) => Promise<Renderer>;
}

// Section landing pages that still go through discovery
const BLOG_SECTION_PATHS = ['/blog', '/blogs', '/articles', '/posts', '/news', '/resource', '/resources'];

/**
 * True for a URL naming one specific page (non-root path, no trailing slash, not a
 * blog section root), which is extracted directly instead of crawled.
 */
export function isDirectPageUrl(url: string): boolean {
  const path = new URL(url).pathname;
  if (!path || path === '/' || path.endsWith('/')) return false;
  return !BLOG_SECTION_PATHS.includes(path.toLowerCase());
}

export function parseScrapeOptions(options: ScrapeOptions): ResolvedOptions {
  const parsed = ScrapeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`);
    throw new ConfigurationError(issues.join('; '));
  }
  return parsed.data;
}

/** Discovers, extracts and post-processes the content of one site. */
export class SiteScraper {
  private readonly options: ResolvedOptions;
  private readonly signal?: AbortSignal;
  private readonly log: pino.Logger;

  constructor(
    options: ScrapeOptions,
    private readonly overrides: ScraperOverrides = {}
  ) {
    this.options = parseScrapeOptions(options);
    this.signal = options.signal;
    this.log = createChildLogger(generateCorrelationId());
  }

  async scrape(): Promise<ScrapeResult> {
    const env = getEnvironment();
    const { baseUrl, maxItems, useBrowser } = this.options;
    const maxConcurrent = this.options.maxConcurrent ?? env.MAX_CONCURRENT;
    const chunkSize = this.options.chunkSize ?? env.CHUNK_SIZE;
    const log = this.log;

    log.info({ event: 'scrape_start', baseUrl, maxItems, useBrowser, maxConcurrent }, `Scraping ${baseUrl}`);

    const http = this.overrides.createHttpClient
      ? this.overrides.createHttpClient(log, maxConcurrent)
      : new HttpClient({ connections: maxConcurrent, defaultTimeoutMs: env.REQUEST_TIMEOUT_MS });
    let pool: StrategyPool | undefined;
    let renderer: Renderer | undefined;

    try {
      pool = this.overrides.createStrategyPool
        ? this.overrides.createStrategyPool(log)
        : createStrategyPool({ mode: env.EXTRACTION_MODE, size: env.EXTRACTION_WORKERS, log });

      if (useBrowser) {
        renderer = await this.launchRenderer();
      }

      const candidates = await this.collectCandidates(http, renderer);
      if (candidates.length === 0) {
        log.warn({ event: 'scrape_no_candidates', baseUrl }, 'No content URLs discovered');
        return { site: baseUrl, items: [] };
      }

      const selected = candidates.slice(0, maxItems);
      const engine = new ExtractionEngine({ http, pool, log, maxConcurrent, renderer });
      const extracted = await withTiming(log, 'extract_all', () => engine.extractAll(selected, this.signal), {
        urls: selected.length,
      });
      if (extracted.length === 0) {
        log.warn({ event: 'scrape_no_items', baseUrl }, 'No content could be extracted');
        return { site: baseUrl, items: [] };
      }

      const processor = new ContentProcessor({ log, chunkSize });
      const items = processor.process(extracted);
      log.info({ event: 'scrape_complete', baseUrl, items: items.length }, `Scrape finished with ${items.length} items`);
      return { site: baseUrl, items };
    } catch (error) {
      if (this.signal?.aborted) throw error;
      throw toScraperError(error, `Scrape of ${baseUrl} failed`);
    } finally {
      await this.release(http, pool, renderer);
    }
  }

  private async collectCandidates(http: HttpFetcher, renderer: Renderer | undefined): Promise<string[]> {
    const { baseUrl } = this.options;
    if (isDirectPageUrl(baseUrl)) {
      this.log.info({ event: 'direct_url', baseUrl }, 'Extracting the given page directly');
      return [baseUrl];
    }

    const discoverer = new UrlDiscoverer({ http, renderer, log: this.log });
    const urls = await withTiming(this.log, 'discovery', () => discoverer.discover(baseUrl, this.signal));
    this.log.info({ event: 'discovery_complete', count: urls.length }, `Discovered ${urls.length} URLs`);
    return urls;
  }

  /** A browser that fails to start downgrades the scrape to HTTP-only. */
  private async launchRenderer(): Promise<Renderer | undefined> {
    try {
      return this.overrides.launchRenderer
        ? await this.overrides.launchRenderer(this.log)
        : await PlaywrightRenderer.launch({ log: this.log });
    } catch (error) {
      const failure = error instanceof RenderError ? error : new RenderError(errorMessage(error), undefined, { cause: error });
      this.log.warn({ event: 'browser_unavailable', error: failure.message }, 'Continuing without browser rendering');
      return undefined;
    }
  }

  private async release(http: ClosableHttpFetcher, pool?: StrategyPool, renderer?: Renderer): Promise<void> {
    const closers: Array<[string, () => Promise<void>]> = [['http', http.close.bind(http)]];
    if (pool) closers.push(['pool', pool.close.bind(pool)]);
    if (renderer) closers.push(['renderer', renderer.close.bind(renderer)]);

    for (const [resource, close] of closers) {
      try {
        await close();
      } catch (error) {
        this.log.warn({ event: 'resource_release_failed', resource, error: errorMessage(error) });
      }
    }
  }
}

export async function scrapeSite(options: ScrapeOptions, overrides?: ScraperOverrides): Promise<ScrapeResult> {
  return new SiteScraper(options, overrides).scrape();
}
