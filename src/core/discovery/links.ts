import * as cheerio from 'cheerio';
import { resolveUrl } from '../../utils/urlValidator';

export interface AnchorLink {
  /** The raw attribute value. */
  href: string;
  /** Absolute URL, resolved against the page the anchor came from. */
  url: string;
  text: string;
}

/** Every `<a href>` below `scope` (the whole document by default). */
export function collectAnchors(html: string, pageUrl: string, scope?: string): AnchorLink[] {
  const $ = cheerio.load(html);
  const anchors: AnchorLink[] = [];
  const root = scope ? $(scope).find('a[href]') : $('a[href]');

  root.each((_, el) => {
    const href = ($(el).attr('href') ?? '').trim();
    if (!href) return;
    const url = resolveUrl(href, pageUrl);
    if (!url) return;
    anchors.push({ href, url, text: $(el).text().trim().toLowerCase() });
  });

  return anchors;
}
