export { scrapeSite, SiteScraper, isDirectPageUrl } from './core/scraper';
export type { ScrapeOptions, ScraperOverrides, ClosableHttpFetcher } from './core/scraper';
export { serializeScrapeResult, CONTENT_TYPES } from './core/types';
export type {
  ContentItem,
  ContentType,
  ScrapeResult,
  SerializedContentItem,
  SerializedScrapeResult,
} from './core/types';
export { UrlDiscoverer } from './core/discovery/urlDiscoverer';
export { ExtractionEngine } from './core/content/extractionEngine';
export { ContentProcessor } from './core/content/contentProcessor';
export { classifyContent } from './core/content/classifier';
export { isPlausibleHtml } from './core/content/htmlValidator';
export { isContentUrl, isSectionContentUrl, isLikelyBlogUrl } from './core/discovery/contentUrlFilter';
export { HttpClient } from './core/http/httpClient';
export type { HttpFetcher, HttpResponse, FetchOptions } from './core/http/httpClient';
export type { Renderer, RenderResult, InteractiveDiscovery } from './core/render/types';
export { PlaywrightRenderer } from './core/render/playwrightRenderer';
export { createStrategyPool, InlineStrategyPool, ThreadStrategyPool } from './core/content/strategyPool';
export type { StrategyPool, StrategyTask } from './core/content/strategyPool';
export { getStrategy, DEFAULT_STRATEGY_ORDER, STRATEGY_NAMES } from './core/content/extractors';
export type { ExtractionStrategy, StrategyName } from './core/content/extractors';
export * from './core/errors';
