import { existsSync } from 'fs';
import { chromium, type Browser, type BrowserContext, type Page, type Response } from 'playwright-core';
import type pino from 'pino';
import { BROWSER_USER_AGENT, DISCOVERY_LIMITS } from '../../config/constants';
import { getEnvironment } from '../../config/environment';
import { RenderError, errorMessage } from '../errors';
import type { InteractiveDiscovery, RenderOptions, RenderResult, RenderedLink, Renderer } from './types';

const SYSTEM_CHROMIUM_PATHS = ['/usr/bin/chromium', '/usr/bin/chromium-browser', '/bin/chromium'];

const CLICK_CANDIDATE_SELECTORS = [
  'h1, h2, h3',
  '[class*="post"]',
  '[class*="blog"]',
  '[class*="article"]',
  '[class*="card"]',
  'article',
];

const CLICK_TIMEOUT_MS = 3000;
const CLICK_SETTLE_MS = 1000;

interface ClickCandidate {
  selector: string;
  text: string;
}

export interface PlaywrightRendererOptions {
  log: pino.Logger;
  executablePath?: string;
  timeoutMs?: number;
  settleMs?: number;
}

export function findChromiumExecutable(): string | undefined {
  // An exported but empty CHROMIUM_PATH counts as unset
  const configured = getEnvironment().CHROMIUM_PATH?.trim();
  if (configured) return configured;
  return SYSTEM_CHROMIUM_PATHS.find(path => existsSync(path));
}

function isApiResponse(response: Response): boolean {
  const url = response.url();
  return url.endsWith('.json') || url.endsWith('/api/') || url.endsWith('/graphql') || url.includes('api');
}

/**
 * Headless Chromium through playwright-core. It never downloads a browser: it uses
 * CHROMIUM_PATH, a system Chromium, or whatever playwright-core finds on its own.
 */
export class PlaywrightRenderer implements Renderer {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly log: pino.Logger,
    private readonly timeoutMs: number,
    private readonly settleMs: number
  ) {}

  static async launch(options: PlaywrightRendererOptions): Promise<PlaywrightRenderer> {
    const env = getEnvironment();
    const executablePath = options.executablePath ?? findChromiumExecutable();

    try {
      const browser = await chromium.launch({
        headless: true,
        executablePath,
        args: ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu', '--no-first-run'],
      });
      const context = await browser.newContext({
        userAgent: BROWSER_USER_AGENT,
        viewport: { width: 1280, height: 720 },
      });
      options.log.info({ event: 'browser_launched', executablePath: executablePath ?? 'bundled' });
      return new PlaywrightRenderer(
        browser,
        context,
        options.log,
        options.timeoutMs ?? env.RENDER_TIMEOUT_MS,
        options.settleMs ?? env.RENDER_SETTLE_MS
      );
    } catch (error) {
      throw new RenderError(`Browser launch failed: ${errorMessage(error)}`, undefined, { cause: error });
    }
  }

  async render(url: string, options: RenderOptions = {}): Promise<RenderResult> {
    return this.withPage(url, options, async page => {
      await this.open(page, url, options.timeoutMs);
      const links = await page.evaluate((): RenderedLink[] =>
        Array.from(document.querySelectorAll('a[href]')).map(a => ({
          href: a.getAttribute('href') ?? '',
          text: (a.textContent ?? '').trim(),
        }))
      );
      return {
        html: await page.content(),
        title: await page.title(),
        links: links.filter(link => link.href.length > 0),
        finalUrl: page.url(),
      };
    });
  }

  async discoverInteractive(url: string, options: RenderOptions = {}): Promise<InteractiveDiscovery> {
    const pendingPayloads: Promise<unknown>[] = [];

    const collected = await this.withPage(url, options, async page => {
      page.on('response', response => {
        if (response.status() !== 200 || !isApiResponse(response)) return;
        if (!(response.headers()['content-type'] ?? '').includes('json')) return;
        pendingPayloads.push(
          response.json().catch((error: unknown) => {
            this.log.debug({ event: 'api_payload_unreadable', url: response.url(), error: errorMessage(error) });
            return undefined;
          })
        );
      });

      await this.open(page, url, options.timeoutMs);

      const links = await page.evaluate(() =>
        Array.from(document.querySelectorAll('a[href]'))
          .map(a => a.getAttribute('href') ?? '')
          .filter(href => href.length > 0)
      );
      const dataLinks = await page.evaluate(() => {
        const found: string[] = [];
        document.querySelectorAll('[data-href], [data-url], [data-link], [data-slug]').forEach(el => {
          if (!(el instanceof HTMLElement)) return;
          const value = el.dataset.href || el.dataset.url || el.dataset.link || el.dataset.slug;
          if (value) found.push(value);
        });
        return found;
      });
      const candidates = await page.evaluate(
        ({ selectors, max }): ClickCandidate[] => {
          const picked: ClickCandidate[] = [];
          for (const selector of selectors) {
            document.querySelectorAll(selector).forEach(el => {
              const text = (el.textContent ?? '').trim();
              const rect = el.getBoundingClientRect();
              if (text.length <= 10 || text.length >= 200 || rect.width <= 0 || rect.height <= 0) return;
              const clickable =
                el.closest('a') !== null ||
                el.closest('[onclick]') !== null ||
                el.closest('[role="button"]') !== null ||
                getComputedStyle(el).cursor === 'pointer';
              if (clickable) picked.push({ selector, text: text.substring(0, 100) });
            });
          }
          return picked.slice(0, max);
        },
        { selectors: CLICK_CANDIDATE_SELECTORS, max: DISCOVERY_LIMITS.MAX_CLICK_CANDIDATES }
      );

      // Bodies must be read before the page closes
      const payloads = await Promise.all(pendingPayloads);
      return { links, dataLinks, candidates, payloads };
    });

    const clicked: string[] = [];
    for (const candidate of collected.candidates) {
      options.signal?.throwIfAborted();
      const reached = await this.followClick(url, candidate, options);
      if (reached) clicked.push(reached);
    }

    return {
      links: collected.links,
      interactionLinks: [...collected.dataLinks, ...clicked],
      apiPayloads: collected.payloads.filter(payload => payload !== undefined),
    };
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
      await this.browser.close();
      this.log.debug({ event: 'browser_closed' });
    } catch (error) {
      this.log.warn({ event: 'browser_close_failed', error: errorMessage(error) }, 'Browser close failed');
    }
  }

  /** Opens the page fresh, clicks the matching element and reports where it navigated. */
  private async followClick(
    baseUrl: string,
    candidate: ClickCandidate,
    options: RenderOptions
  ): Promise<string | undefined> {
    try {
      return await this.withPage(baseUrl, options, async page => {
        await page.goto(baseUrl, { waitUntil: 'networkidle', timeout: options.timeoutMs ?? this.timeoutMs });
        await page.waitForTimeout(CLICK_SETTLE_MS);

        const target = page.locator(candidate.selector).filter({ hasText: candidate.text }).first();
        if ((await target.count()) === 0) return undefined;
        await target.click({ timeout: CLICK_TIMEOUT_MS });
        await page.waitForTimeout(this.settleMs);

        const current = page.url();
        return current !== baseUrl ? current : undefined;
      });
    } catch (error) {
      options.signal?.throwIfAborted();
      this.log.debug({ event: 'click_discovery_failed', selector: candidate.selector, error: errorMessage(error) });
      return undefined;
    }
  }

  private async open(page: Page, url: string, timeoutMs?: number): Promise<void> {
    await page.goto(url, { waitUntil: 'networkidle', timeout: timeoutMs ?? this.timeoutMs });
    await page.waitForTimeout(this.settleMs);
  }

  /** Runs `fn` on a fresh page; an abort closes the page, which fails any pending call. */
  private async withPage<T>(url: string, options: RenderOptions, fn: (page: Page) => Promise<T>): Promise<T> {
    const { signal } = options;
    signal?.throwIfAborted();

    const page = await this.context.newPage();
    const onAbort = (): void => {
      page.close().catch((error: unknown) => {
        this.log.debug({ event: 'page_close_failed', url, error: errorMessage(error) });
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await fn(page);
    } catch (error) {
      signal?.throwIfAborted();
      if (error instanceof RenderError) throw error;
      throw new RenderError(errorMessage(error), url, { cause: error });
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!page.isClosed()) {
        await page.close().catch((error: unknown) => {
          this.log.debug({ event: 'page_close_failed', url, error: errorMessage(error) });
        });
      }
    }
  }
}
