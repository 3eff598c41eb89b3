// Utility, legal and asset markers that never point at an article
const SKIP_PATTERNS = [
  '/tag/',
  '/category/',
  '/author/',
  '/page/',
  '/search',
  '/login',
  '/register',
  '/contact',
  '/about',
  '/privacy',
  '/terms',
  '/legal/',
  '/schedule',
  '/demo',
  '/signup',
  '/download',
  '/pricing',
  '/support',
  '.pdf',
  '.jpg',
  '.png',
  '.gif',
  '.css',
  '.js',
  '.xml',
  '.txt',
  '.ico',
  '.woff',
  '.woff2',
  '.ttf',
  '.eot',
  '/_next/',
  '/static/',
  '/assets/',
];

const SECTION_SKIP_PATTERNS = [
  ...SKIP_PATTERNS.filter(pattern => !['/static/', '/assets/'].includes(pattern)),
  '/api/',
];

const CONTENT_PATTERNS: RegExp[] = [
  /\/blogs?\//,
  /\/posts?\//,
  /\/articles?\//,
  /\/news\//,
  /\/casestudies\//,
  /\/case-studies\//,
  /\/stor(y|ies)\//,
  /\/resources?\//,
  /\/insights\//,
  /\/whitepapers\//,
  /\/guides\//,
  /\/updates\//,
  /\/content\//,
  /\/press\//,
  /\/media\//,
  /\/\d{4}\//,
  /\/\d{4}\/\d{2}\//,
];

const SECTION_POST_PATTERNS: RegExp[] = [
  /\/\d{4}\//,
  /\/\d{4}\/\d{2}\//,
  /\/posts?\//,
  /\/articles?\//,
  /\/stor(y|ies)\//,
  /\/entry\//,
  /\/entries\//,
  /\/how-/,
  /\/what-/,
  /\/why-/,
  /\/guide-/,
  /\/tutorial-/,
  /\/resources?\//,
  /\/insights\//,
  /\/updates\//,
  /\/content\//,
  /\/press\//,
  /\/media\//,
  /\/news\//,
];

const CORPORATE_SKIP = [
  'solutions/',
  'products/',
  'services/',
  'industries/',
  'company/',
  'careers/',
  'investors/',
  'partners/',
];

const LIKELY_BLOG_MARKERS = [
  '/blog/',
  '/blogs/',
  '/article/',
  '/articles/',
  '/post/',
  '/posts/',
  '/news/',
  '/resource/',
  '/resources/',
  '/insights/',
  '/updates/',
  '/content/',
  '/press/',
  '/media/',
  '/stories/',
];

function parsePath(url: string): { host: string; path: string } | undefined {
  try {
    const parsed = new URL(url);
    return { host: parsed.host.toLowerCase(), path: parsed.pathname.toLowerCase() };
  } catch {
    return undefined;
  }
}

function countSlashes(path: string): number {
  return path.split('/').length - 1;
}

/**
 * Same-host URL whose path looks like an article rather than a listing, utility
 * or corporate page.
 */
export function isContentUrl(url: string, host: string): boolean {
  const parsed = parsePath(url);
  if (!parsed || parsed.host !== host.toLowerCase()) return false;
  const { path } = parsed;

  if (SKIP_PATTERNS.some(pattern => path.includes(pattern))) return false;
  if (CONTENT_PATTERNS.some(pattern => pattern.test(path))) return true;

  if (path.length > 1 && countSlashes(path) >= 2) {
    return !CORPORATE_SKIP.some(skip => path.includes(skip));
  }
  return false;
}

/**
 * Looser check for links found on a section landing page: anything nested under
 * the section path counts, as do common post slugs.
 */
export function isSectionContentUrl(url: string, sectionUrl: string, host: string): boolean {
  const parsed = parsePath(url);
  if (!parsed || parsed.host !== host.toLowerCase()) return false;
  const { path } = parsed;

  if (SECTION_SKIP_PATTERNS.some(pattern => path.includes(pattern))) return false;

  const sectionPath = parsePath(sectionUrl)?.path ?? '/';
  if (path.startsWith(sectionPath) && path !== sectionPath) {
    const pathParts = path.split('/').filter(Boolean);
    const sectionParts = sectionPath.split('/').filter(Boolean);
    if (pathParts.length > sectionParts.length) return true;
  }

  return SECTION_POST_PATTERNS.some(pattern => pattern.test(path));
}

/** URL shape of a page that should carry its own distinct article. */
export function isLikelyBlogUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return LIKELY_BLOG_MARKERS.some(marker => lower.includes(marker));
}
