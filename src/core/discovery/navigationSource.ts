import { DISCOVERY_LIMITS } from '../../config/constants';
import { isSameHost } from '../../utils/urlValidator';
import { isSectionContentUrl } from './contentUrlFilter';
import { fetchOk, probe, type DiscoveryContext, type DiscoveryStage } from './context';
import { collectAnchors, type AnchorLink } from './links';

const SECTION_KEYWORDS = [
  'blog',
  'blogs',
  'articles',
  'posts',
  'news',
  'resources',
  'resource',
  'insights',
  'stories',
  'updates',
  'content',
  'press',
  'media',
  'guides',
  'whitepapers',
  'case studies',
  'learn',
  'knowledge',
];

function pointsAtSection(anchor: AnchorLink): boolean {
  const href = anchor.href.toLowerCase();
  return SECTION_KEYWORDS.some(keyword => anchor.text.includes(keyword) || href.includes(keyword));
}

/** Same-host section landing pages linked from the nav, or from anywhere if the nav has none. */
export function findSectionCandidates(html: string, baseUrl: string, host: string): string[] {
  const pick = (anchors: AnchorLink[]): string[] =>
    anchors.filter(pointsAtSection).map(anchor => anchor.url).filter(url => isSameHost(url, host));

  let candidates = pick(collectAnchors(html, baseUrl, 'nav, header, menu'));
  if (candidates.length === 0) {
    candidates = pick(collectAnchors(html, baseUrl));
  }
  return [...new Set(candidates)];
}

/** Post links on a section page; loose same-host links when nothing post-shaped is there. */
export function collectSectionLinks(html: string, sectionUrl: string, host: string): string[] {
  const anchors = collectAnchors(html, sectionUrl);

  const strict = anchors
    .map(anchor => anchor.url)
    .filter(url => isSectionContentUrl(url, sectionUrl, host));
  if (strict.length > 0) return strict;

  const loose: string[] = [];
  for (const anchor of anchors) {
    if (anchor.href.startsWith('#') || anchor.href.toLowerCase().startsWith('javascript:')) continue;
    if (!isSameHost(anchor.url, host) || anchor.url === sectionUrl) continue;
    loose.push(anchor.url);
    if (loose.length >= DISCOVERY_LIMITS.MAX_LOOSE_SECTION_URLS) break;
  }
  return loose;
}

export const navigationSource: DiscoveryStage = {
  name: 'navigation',
  fallbackOnly: true,

  async discover(ctx: DiscoveryContext): Promise<string[]> {
    const html = await fetchOk(ctx, ctx.baseUrl);
    if (!html) return [];

    const sections = findSectionCandidates(html, ctx.baseUrl, ctx.host).slice(
      0,
      DISCOVERY_LIMITS.MAX_NAVIGATION_SECTIONS
    );
    ctx.log.debug({ event: 'navigation_sections', sections });

    const urls: string[] = [];
    for (const sectionUrl of sections) {
      const sectionHtml = await probe(ctx, sectionUrl);
      if (sectionHtml) urls.push(...collectSectionLinks(sectionHtml, sectionUrl, ctx.host));
    }
    return urls;
  },
};
