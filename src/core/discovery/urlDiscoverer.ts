import type pino from 'pino';
import { DISCOVERY_LIMITS } from '../../config/constants';
import { getEnvironment } from '../../config/environment';
import { hostOf } from '../../utils/urlValidator';
import { withTiming } from '../../utils/logger';
import { DiscoveryError, ValidationError, errorMessage } from '../errors';
import type { HttpFetcher } from '../http/httpClient';
import type { Renderer } from '../render/types';
import { blogPathSource } from './blogPathSource';
import { browserSource } from './browserSource';
import type { DiscoveryContext, DiscoveryStage, DiscoveryTimeouts } from './context';
import { feedSource } from './feedSource';
import { navigationSource } from './navigationSource';
import { sitemapSource } from './sitemapSource';
import { spaSource } from './spaSource';

export const DEFAULT_STAGES: readonly DiscoveryStage[] = [
  sitemapSource,
  feedSource,
  blogPathSource,
  spaSource,
  navigationSource,
  browserSource,
];

export interface UrlDiscovererOptions {
  http: HttpFetcher;
  log: pino.Logger;
  /** Present only in browser mode with a launched browser. */
  renderer?: Renderer;
  timeouts?: Partial<DiscoveryTimeouts>;
  stages?: readonly DiscoveryStage[];
}

/**
 * Runs the discovery stages in order and merges their results. A failing stage is
 * logged and skipped; fallback stages run only while few URLs were found.
 */
export class UrlDiscoverer {
  private readonly stages: readonly DiscoveryStage[];
  private readonly timeouts: DiscoveryTimeouts;

  constructor(private readonly options: UrlDiscovererOptions) {
    const env = getEnvironment();
    this.stages = options.stages ?? DEFAULT_STAGES;
    this.timeouts = {
      sitemapMs: options.timeouts?.sitemapMs ?? env.SITEMAP_TIMEOUT_MS,
      discoveryMs: options.timeouts?.discoveryMs ?? env.DISCOVERY_TIMEOUT_MS,
      renderMs: options.timeouts?.renderMs ?? env.RENDER_TIMEOUT_MS,
    };
  }

  async discover(baseUrl: string, signal?: AbortSignal): Promise<string[]> {
    const host = hostOf(baseUrl);
    if (!host) {
      throw new ValidationError(`Invalid base URL: ${baseUrl}`);
    }

    const { log } = this.options;
    const ctx: DiscoveryContext = {
      baseUrl,
      host,
      http: this.options.http,
      renderer: this.options.renderer,
      timeouts: this.timeouts,
      signal,
      log,
    };

    const urls = new Set<string>();
    for (const stage of this.stages) {
      signal?.throwIfAborted();
      if (stage.fallbackOnly && urls.size >= DISCOVERY_LIMITS.FALLBACK_THRESHOLD) continue;
      if (stage.isEnabled && !stage.isEnabled(ctx)) continue;

      try {
        const found = await withTiming(log, 'discovery_stage', () => stage.discover(ctx), {
          stage: stage.name,
        });
        found.forEach(url => urls.add(url));
        log.info({ event: 'discovery_stage_complete', stage: stage.name, found: found.length, total: urls.size });
      } catch (error) {
        signal?.throwIfAborted();
        const failure = new DiscoveryError(stage.name, errorMessage(error), { cause: error });
        log.warn({ event: 'discovery_stage_failed', stage: stage.name, error: failure.message }, failure.message);
      }
    }

    return [...urls];
  }
}
