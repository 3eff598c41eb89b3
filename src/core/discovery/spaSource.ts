import { isSameHost, resolveUrl } from '../../utils/urlValidator';
import { isContentUrl } from './contentUrlFilter';
import { fetchOk, type DiscoveryContext, type DiscoveryStage } from './context';

const HREF_ATTRIBUTE = /href="([^"]*)"/gi;
const JSON_HREF = /"href":\s*"([^"]*)"/g;
const JSON_HREF_KEYWORDS = ['blog', 'article', 'post'];

/**
 * Scans raw markup (including inline script payloads) for link targets that a
 * client-side router would render later.
 */
export function scanMarkupForUrls(markup: string, baseUrl: string, host: string): string[] {
  const found = new Set<string>();

  for (const match of markup.matchAll(HREF_ATTRIBUTE)) {
    const url = resolveUrl(match[1], baseUrl);
    if (url && isContentUrl(url, host)) found.add(url);
  }

  for (const match of markup.matchAll(JSON_HREF)) {
    const href = match[1];
    if (!href.startsWith('/')) continue;
    const lower = href.toLowerCase();
    if (!JSON_HREF_KEYWORDS.some(keyword => lower.includes(keyword))) continue;
    const url = resolveUrl(href, baseUrl);
    if (url && isSameHost(url, host)) found.add(url);
  }

  return [...found];
}

export const spaSource: DiscoveryStage = {
  name: 'spa',
  fallbackOnly: true,

  async discover(ctx: DiscoveryContext): Promise<string[]> {
    const html = await fetchOk(ctx, ctx.baseUrl);
    return html ? scanMarkupForUrls(html, ctx.baseUrl, ctx.host) : [];
  },
};
