import Parser from 'rss-parser';
import { errorMessage } from '../errors';
import { isSameHost, resolveUrl } from '../../utils/urlValidator';
import { probe, type DiscoveryContext, type DiscoveryStage } from './context';

const FEED_PATHS = ['/feed', '/rss', '/feed.xml', '/rss.xml', '/atom.xml', '/blog/feed', '/blog/rss'];

const parser = new Parser<Record<string, unknown>, Record<string, unknown>>();

/** Item links of an RSS or Atom document that live on `host`. */
export async function parseFeedLinks(xml: string, feedUrl: string, host: string): Promise<string[]> {
  const feed = await parser.parseString(xml);
  const links: string[] = [];
  for (const item of feed.items) {
    if (!item.link) continue;
    const url = resolveUrl(item.link.trim(), feedUrl);
    if (url && isSameHost(url, host)) links.push(url);
  }
  return links;
}

export const feedSource: DiscoveryStage = {
  name: 'feed',
  fallbackOnly: false,

  async discover(ctx: DiscoveryContext): Promise<string[]> {
    const urls: string[] = [];

    for (const path of FEED_PATHS) {
      const feedUrl = resolveUrl(path, ctx.baseUrl);
      if (!feedUrl) continue;
      const xml = await probe(ctx, feedUrl, {
        accept: 'application/rss+xml,application/atom+xml,application/xml;q=0.9,*/*;q=0.8',
      });
      if (!xml) continue;

      try {
        const links = await parseFeedLinks(xml, feedUrl, ctx.host);
        ctx.log.debug({ event: 'feed_parsed', feedUrl, links: links.length });
        urls.push(...links);
      } catch (error) {
        // A 200 on /feed is often an HTML page, not a feed
        ctx.log.debug({ event: 'feed_parse_failed', feedUrl, error: errorMessage(error) });
      }
    }

    return urls;
  },
};
