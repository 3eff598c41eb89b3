import * as cheerio from 'cheerio';
import { SITEMAP_LIMITS } from '../../config/constants';
import { resolveUrl } from '../../utils/urlValidator';
import { isContentUrl } from './contentUrlFilter';
import { probe, type DiscoveryContext, type DiscoveryStage } from './context';

export interface SitemapEntry {
  url: string;
  /** `YYYY-MM-DD` date part of `<lastmod>`, when present and well-formed. */
  lastmod?: string;
}

export interface ParsedUrlset {
  entries: SitemapEntry[];
  /** `<url>` elements looked at before the loop stopped. */
  processed: number;
}

const SITEMAP_PROBE_PATHS = ['/sitemap.xml', '/sitemap_index.xml'];
const LASTMOD_DATE = /^(\d{4}-\d{2}-\d{2})/;

function parseLastmod(raw: string): string | undefined {
  const match = LASTMOD_DATE.exec(raw.trim());
  if (!match) return undefined;
  const date = match[1];
  return Number.isNaN(Date.parse(date)) ? undefined : date;
}

export function isSitemapIndex(xml: string): boolean {
  return cheerio.load(xml, { xml: true })('sitemapindex, sitemap > loc').length > 0;
}

/** Nested sitemap locations of a `<sitemapindex>`, capped at the per-index limit. */
export function parseSitemapIndex(xml: string): string[] {
  const $ = cheerio.load(xml, { xml: true });
  const locs: string[] = [];
  $('sitemap').each((_, el) => {
    const loc = $(el).children('loc').first().text().trim();
    if (loc) locs.push(loc);
  });
  return locs.slice(0, SITEMAP_LIMITS.MAX_NESTED_SITEMAPS);
}

/**
 * Reads `<url>` entries, keeping the ones that look like content on `host`.
 * Stops after MAX_URL_ENTRIES elements or once MAX_ACCEPTED_URLS were kept.
 */
export function parseUrlset(xml: string, host: string): ParsedUrlset {
  const $ = cheerio.load(xml, { xml: true });
  const entries: SitemapEntry[] = [];
  let processed = 0;

  for (const el of $('url').toArray()) {
    if (processed >= SITEMAP_LIMITS.MAX_URL_ENTRIES) break;
    if (entries.length >= SITEMAP_LIMITS.MAX_ACCEPTED_URLS) break;
    processed++;

    const $url = $(el);
    const loc = $url.children('loc').first().text().trim();
    if (!loc || !isContentUrl(loc, host)) continue;

    const lastmod = parseLastmod($url.children('lastmod').first().text());
    entries.push(lastmod ? { url: loc, lastmod } : { url: loc });
  }

  return { entries, processed };
}

/** Newest first by lastmod, undated entries last in their original order. */
export function selectRecent(entries: SitemapEntry[], limit: number = SITEMAP_LIMITS.MAX_RECENT_URLS): string[] {
  const dated = entries.filter(entry => entry.lastmod !== undefined);
  const undated = entries.filter(entry => entry.lastmod === undefined);
  // ISO dates compare correctly as strings; Array.prototype.sort is stable
  dated.sort((a, b) => (b.lastmod ?? '').localeCompare(a.lastmod ?? ''));
  return [...dated, ...undated].slice(0, limit).map(entry => entry.url);
}

export function sitemapsFromRobots(robotsTxt: string, baseUrl: string): string[] {
  const found: string[] = [];
  for (const line of robotsTxt.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed.toLowerCase().startsWith('sitemap:')) continue;
    const resolved = resolveUrl(trimmed.slice('sitemap:'.length).trim(), baseUrl);
    if (resolved) found.push(resolved);
  }
  return found;
}

async function collectSitemap(
  ctx: DiscoveryContext,
  sitemapUrl: string,
  visited: Set<string>
): Promise<string[]> {
  if (visited.has(sitemapUrl)) return [];
  visited.add(sitemapUrl);

  const xml = await probe(ctx, sitemapUrl, {
    timeoutMs: ctx.timeouts.sitemapMs,
    maxBytes: SITEMAP_LIMITS.MAX_BYTES,
    accept: 'application/xml,text/xml;q=0.9,*/*;q=0.8',
  });
  if (!xml) return [];

  if (isSitemapIndex(xml)) {
    const urls: string[] = [];
    for (const nested of parseSitemapIndex(xml)) {
      urls.push(...(await collectSitemap(ctx, nested, visited)));
      if (urls.length > SITEMAP_LIMITS.MAX_ACCEPTED_URLS) {
        ctx.log.info({ event: 'sitemap_url_limit', sitemapUrl, count: urls.length });
        break;
      }
    }
    return urls;
  }

  const { entries, processed } = parseUrlset(xml, ctx.host);
  ctx.log.debug({ event: 'sitemap_parsed', sitemapUrl, processed, accepted: entries.length });
  return selectRecent(entries);
}

export const sitemapSource: DiscoveryStage = {
  name: 'sitemap',
  fallbackOnly: false,

  async discover(ctx: DiscoveryContext): Promise<string[]> {
    const visited = new Set<string>();
    const urls: string[] = [];

    for (const path of SITEMAP_PROBE_PATHS) {
      const sitemapUrl = resolveUrl(path, ctx.baseUrl);
      if (sitemapUrl) urls.push(...(await collectSitemap(ctx, sitemapUrl, visited)));
    }

    const robotsUrl = resolveUrl('/robots.txt', ctx.baseUrl);
    const robots = robotsUrl ? await probe(ctx, robotsUrl, { timeoutMs: ctx.timeouts.sitemapMs }) : undefined;
    if (robots) {
      for (const sitemapUrl of sitemapsFromRobots(robots, ctx.baseUrl)) {
        urls.push(...(await collectSitemap(ctx, sitemapUrl, visited)));
      }
    }

    return urls;
  },
};
