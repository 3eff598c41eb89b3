import pLimit from 'p-limit';
import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import { ExtractionError, ScraperError, errorMessage, isAbortError } from '../errors';
import type { HttpFetcher } from '../http/httpClient';
import type { Renderer } from '../render/types';
import type { ContentItem } from '../types';
import { DEFAULT_STRATEGY_ORDER, type StrategyName } from './extractors';
import { isPlausibleHtml } from './htmlValidator';
import type { StrategyPool } from './strategyPool';
import { raceStrategies } from './strategyRace';

export interface ExtractionEngineOptions {
  http: HttpFetcher;
  pool: StrategyPool;
  log: pino.Logger;
  maxConcurrent: number;
  /** Browser fallback is attempted only when this is set. */
  renderer?: Renderer;
  strategies?: readonly StrategyName[];
  requestTimeoutMs?: number;
  renderTimeoutMs?: number;
}

type Outcome = 'http' | 'browser' | 'abandoned';

/**
 * Fetches and extracts many URLs under a concurrency bound. A URL either yields one
 * item or nothing; a failure on one URL never affects the others.
 */
export class ExtractionEngine {
  private readonly strategies: readonly StrategyName[];
  private readonly requestTimeoutMs: number;
  private readonly renderTimeoutMs: number;

  constructor(private readonly options: ExtractionEngineOptions) {
    const env = getEnvironment();
    this.strategies = options.strategies ?? DEFAULT_STRATEGY_ORDER;
    this.requestTimeoutMs = options.requestTimeoutMs ?? env.REQUEST_TIMEOUT_MS;
    this.renderTimeoutMs = options.renderTimeoutMs ?? env.RENDER_TIMEOUT_MS;
  }

  async extractAll(urls: readonly string[], signal?: AbortSignal): Promise<ContentItem[]> {
    const { log } = this.options;
    const limit = pLimit(this.options.maxConcurrent);
    const started = Date.now();

    const results = await Promise.all(
      urls.map((url, index) =>
        limit(async () => {
          if (signal?.aborted) return null;
          return this.extractSafely(url, index, signal);
        })
      )
    );

    const items = results.filter((item): item is ContentItem => item !== null);
    log.info(
      { event: 'extraction_complete', requested: urls.length, extracted: items.length, durationMs: Date.now() - started },
      `Extracted ${items.length}/${urls.length} URLs`
    );
    return items;
  }

  /** Never rejects: every failure is logged and turns into null. */
  async extractSafely(url: string, index: number, signal?: AbortSignal): Promise<ContentItem | null> {
    const { log } = this.options;
    const started = Date.now();
    try {
      const { item, outcome } = await this.extractOne(url, signal);
      log.debug({ event: 'extraction_result', index, url, outcome, durationMs: Date.now() - started });
      return item;
    } catch (error) {
      const level = signal?.aborted || isAbortError(error) ? 'debug' : 'warn';
      const failure = error instanceof ScraperError ? error : new ExtractionError(errorMessage(error), url);
      log[level]({ event: 'extraction_failed', index, url, code: failure.code, error: failure.message }, 'Extraction failed');
      return null;
    }
  }

  private async extractOne(url: string, signal?: AbortSignal): Promise<{ item: ContentItem | null; outcome: Outcome }> {
    const html = await this.fetchHtml(url, signal);
    if (html !== undefined) {
      const winner = await raceStrategies(this.options.pool, url, html, {
        strategies: this.strategies,
        signal,
        log: this.options.log,
      });
      if (winner) {
        this.options.log.debug({ event: 'strategy_won', url, strategy: winner.strategy });
        return { item: winner.item, outcome: 'http' };
      }
    }

    const { renderer } = this.options;
    if (!renderer) return { item: null, outcome: 'abandoned' };
    signal?.throwIfAborted();

    const rendered = await renderer.render(url, { timeoutMs: this.renderTimeoutMs, signal });
    const winner = await raceStrategies(this.options.pool, url, rendered.html, {
      strategies: this.strategies,
      signal,
      log: this.options.log,
    });
    return winner ? { item: winner.item, outcome: 'browser' } : { item: null, outcome: 'abandoned' };
  }

  /** The body when the fetch is conclusive, undefined when it should fall through. */
  private async fetchHtml(url: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      const res = await this.options.http.fetch(url, { timeoutMs: this.requestTimeoutMs, signal });
      if (res.statusCode !== 200) {
        this.options.log.debug({ event: 'fetch_inconclusive', url, statusCode: res.statusCode });
        return undefined;
      }
      if (!isPlausibleHtml(res.bodyText)) {
        this.options.log.debug({ event: 'fetch_inconclusive', url, reason: 'implausible_html' });
        return undefined;
      }
      return res.bodyText;
    } catch (error) {
      signal?.throwIfAborted();
      this.options.log.debug({ event: 'fetch_failed', url, error: errorMessage(error) });
      return undefined;
    }
  }
}
