import { resolveUrl } from '../../utils/urlValidator';
import { isContentUrl } from './contentUrlFilter';
import type { DiscoveryContext, DiscoveryStage } from './context';

const URL_KEYS = new Set(['url', 'link', 'href', 'slug', 'path']);

/** Walks a decoded JSON payload collecting string values under URL-shaped keys. */
export function extractUrlsFromJson(data: unknown, baseUrl: string, host: string, into: Set<string> = new Set()): Set<string> {
  if (Array.isArray(data)) {
    for (const item of data) extractUrlsFromJson(item, baseUrl, host, into);
    return into;
  }
  if (data === null || typeof data !== 'object') return into;

  const entries: [string, unknown][] = Object.entries(data);
  for (const [key, value] of entries) {
    if (typeof value === 'string') {
      if (!URL_KEYS.has(key)) continue;
      const url = resolveUrl(value, baseUrl);
      if (url && isContentUrl(url, host)) into.add(url);
    } else {
      extractUrlsFromJson(value, baseUrl, host, into);
    }
  }
  return into;
}

export const browserSource: DiscoveryStage = {
  name: 'browser',
  fallbackOnly: true,

  isEnabled(ctx: DiscoveryContext): boolean {
    return ctx.renderer !== undefined;
  },

  async discover(ctx: DiscoveryContext): Promise<string[]> {
    if (!ctx.renderer) return [];

    const found = await ctx.renderer.discoverInteractive(ctx.baseUrl, {
      timeoutMs: ctx.timeouts.renderMs,
      signal: ctx.signal,
    });

    const urls = new Set<string>();
    for (const href of [...found.links, ...found.interactionLinks]) {
      const url = resolveUrl(href, ctx.baseUrl);
      if (url && isContentUrl(url, ctx.host)) urls.add(url);
    }
    for (const payload of found.apiPayloads) {
      extractUrlsFromJson(payload, ctx.baseUrl, ctx.host, urls);
    }

    ctx.log.debug({
      event: 'browser_discovery',
      links: found.links.length,
      interactionLinks: found.interactionLinks.length,
      apiPayloads: found.apiPayloads.length,
      accepted: urls.size,
    });
    return [...urls];
  },
};
