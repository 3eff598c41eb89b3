import { PACKAGE_VERSION } from '../utils/version';

export const APP_NAME = 'site-scraper';
export const APP_VERSION = PACKAGE_VERSION;

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_MAX_ITEMS = 100;

export const CONTENT_THRESHOLDS = {
  // Minimum trimmed length for a strategy to return an item at all
  MIN_ITEM_LENGTH: 100,
  // A strategy result must exceed this to win the race
  MIN_WINNING_LENGTH: 200,
  // Tutorial heuristics only look at content with more words than this
  TUTORIAL_MIN_WORDS: 100,
} as const;

export const HTML_VALIDITY = {
  MIN_BYTES: 512,
  MIN_CONTENT_TAGS: 2,
} as const;

export const CHUNKING = {
  SPLIT_FACTOR: 1.5,
  MAX_CHUNKS: 3,
  MIN_CHUNK_LENGTH: 1000,
  PARAGRAPH_SEPARATOR: '\n\n',
} as const;

export const SITEMAP_LIMITS = {
  MAX_NESTED_SITEMAPS: 3,
  MAX_BYTES: 20 * 1024 * 1024,
  MAX_URL_ENTRIES: 2000,
  MAX_ACCEPTED_URLS: 1000,
  MAX_RECENT_URLS: 100,
} as const;

export const DISCOVERY_LIMITS = {
  // Fallback stages only run while fewer URLs than this were found
  FALLBACK_THRESHOLD: 5,
  MAX_NAVIGATION_SECTIONS: 3,
  MAX_LOOSE_SECTION_URLS: 10,
  SECTION_PROBE_CONCURRENCY: 4,
  MAX_CLICK_CANDIDATES: 10,
} as const;

export const TEMPLATE_TITLE_PREFIX = '[Template Content] ';
