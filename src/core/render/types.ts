export interface RenderedLink {
  href: string;
  text: string;
}

export interface RenderResult {
  html: string;
  title: string;
  links: RenderedLink[];
  finalUrl: string;
}

export interface RenderOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Links surfaced by driving the page rather than reading its static markup. */
export interface InteractiveDiscovery {
  /** Anchors present once the page settled. */
  links: string[];
  /** URLs reached by clicking post-like containers, plus data-href style attributes. */
  interactionLinks: string[];
  /** JSON bodies of API/XHR responses observed while the page loaded. */
  apiPayloads: unknown[];
}

/**
 * Headless-browser capability. One instance owns one browser and one context;
 * every call opens and closes its own page.
 */
export interface Renderer {
  render(url: string, options?: RenderOptions): Promise<RenderResult>;
  discoverInteractive(url: string, options?: RenderOptions): Promise<InteractiveDiscovery>;
  close(): Promise<void>;
}
