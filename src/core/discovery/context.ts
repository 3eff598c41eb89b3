import type pino from 'pino';
import type { FetchOptions, HttpFetcher } from '../http/httpClient';
import type { Renderer } from '../render/types';

export interface DiscoveryTimeouts {
  sitemapMs: number;
  discoveryMs: number;
  renderMs: number;
}

export interface DiscoveryContext {
  baseUrl: string;
  /** Host (with port) every discovered URL must share. */
  host: string;
  http: HttpFetcher;
  renderer?: Renderer;
  timeouts: DiscoveryTimeouts;
  signal?: AbortSignal;
  log: pino.Logger;
}

export interface DiscoveryStage {
  readonly name: string;
  /** Fallback stages only run while the merged set is still small. */
  readonly fallbackOnly: boolean;
  isEnabled?(ctx: DiscoveryContext): boolean;
  discover(ctx: DiscoveryContext): Promise<string[]>;
}

/**
 * GET that yields the body for a 200 response and undefined for any other status.
 * Network failures still throw so the calling stage decides how far they reach.
 */
export async function fetchOk(
  ctx: DiscoveryContext,
  url: string,
  options: Omit<FetchOptions, 'signal'> = {}
): Promise<string | undefined> {
  const res = await ctx.http.fetch(url, {
    timeoutMs: ctx.timeouts.discoveryMs,
    ...options,
    signal: ctx.signal,
  });
  if (res.statusCode !== 200) {
    ctx.log.debug({ event: 'discovery_fetch_skipped', url, statusCode: res.statusCode });
    return undefined;
  }
  return res.bodyText;
}

/** Like fetchOk, but a network failure on an optional probe only logs. */
export async function probe(
  ctx: DiscoveryContext,
  url: string,
  options: Omit<FetchOptions, 'signal'> = {}
): Promise<string | undefined> {
  try {
    return await fetchOk(ctx, url, options);
  } catch (error) {
    ctx.signal?.throwIfAborted();
    ctx.log.debug(
      { event: 'discovery_probe_failed', url, error: error instanceof Error ? error.message : error },
      'Probe failed'
    );
    return undefined;
  }
}
