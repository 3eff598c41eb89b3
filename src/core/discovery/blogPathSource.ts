import pLimit from 'p-limit';
import { DISCOVERY_LIMITS } from '../../config/constants';
import { resolveUrl } from '../../utils/urlValidator';
import { isContentUrl } from './contentUrlFilter';
import { probe, type DiscoveryContext, type DiscoveryStage } from './context';
import { collectAnchors } from './links';

export const SECTION_PATHS = [
  '/blog',
  '/blogs',
  '/articles',
  '/posts',
  '/news',
  '/resource',
  '/resources',
  '/insights',
  '/updates',
  '/content',
  '/press',
  '/media',
  '/stories',
];

export const blogPathSource: DiscoveryStage = {
  name: 'blog-paths',
  fallbackOnly: false,

  async discover(ctx: DiscoveryContext): Promise<string[]> {
    const limit = pLimit(DISCOVERY_LIMITS.SECTION_PROBE_CONCURRENCY);

    const perSection = await Promise.all(
      SECTION_PATHS.map(path =>
        limit(async () => {
          const sectionUrl = resolveUrl(path, ctx.baseUrl);
          if (!sectionUrl) return [];
          const html = await probe(ctx, sectionUrl);
          if (!html) return [];
          return collectAnchors(html, sectionUrl)
            .map(anchor => anchor.url)
            .filter(url => isContentUrl(url, ctx.host));
        })
      )
    );

    return perSection.flat();
  },
};
