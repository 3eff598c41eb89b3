import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import {
  ALL_NON_TEXTUAL_SELECTORS,
  NOISE_SELECTORS,
  PAGE_HEADER_SELECTORS,
  SCORABLE_CONTAINERS,
} from './selectors';
import { markdownConverter } from './markdownConverter';
import { defineStrategy } from './strategy';

const META_TITLE_SELECTORS = ['meta[property="og:title"]', 'meta[name="twitter:title"]'];

function findHeadline(node: unknown): string | undefined {
  if (Array.isArray(node)) {
    for (const entry of node) {
      const found = findHeadline(entry);
      if (found) return found;
    }
    return undefined;
  }
  if (node === null || typeof node !== 'object') return undefined;

  if ('headline' in node && typeof node.headline === 'string' && node.headline.trim()) {
    return node.headline.trim();
  }
  return '@graph' in node ? findHeadline(node['@graph']) : undefined;
}

/** og:title, then twitter:title, then a JSON-LD `headline`. */
export function readMetadataTitle($: cheerio.CheerioAPI): string | undefined {
  for (const selector of META_TITLE_SELECTORS) {
    const content = $(selector).attr('content')?.trim();
    if (content) return content;
  }

  for (const el of $('script[type="application/ld+json"]').toArray()) {
    try {
      const parsed: unknown = JSON.parse($(el).text());
      const headline = findHeadline(parsed);
      if (headline) return headline;
    } catch {
      continue; // malformed JSON-LD blocks are common and carry nothing usable
    }
  }
  return undefined;
}

/**
 * Text weight of a container: the length of its direct paragraph children,
 * discounted by how much of its text sits inside links.
 */
export function scoreContainer($: cheerio.CheerioAPI, el: Element): number {
  const $el = $(el);
  const paragraphText = $el
    .children('p')
    .toArray()
    .reduce((sum, p) => sum + $(p).text().trim().length, 0);
  if (paragraphText === 0) return 0;

  const totalText = $el.text().trim().length;
  const linkText = $el
    .find('a')
    .toArray()
    .reduce((sum, a) => sum + $(a).text().trim().length, 0);
  const linkDensity = totalText > 0 ? linkText / totalText : 1;

  return paragraphText * (1 - linkDensity);
}

export const boilerplateStrategy = defineStrategy('boilerplate', (_url, html) => {
  const $ = cheerio.load(html);
  const pageTitle = $('title').first().text().trim() || undefined;
  const metadataTitle = readMetadataTitle($);

  $(ALL_NON_TEXTUAL_SELECTORS).remove();
  $(NOISE_SELECTORS).remove();
  $(PAGE_HEADER_SELECTORS).remove();

  let best: Element | undefined;
  let bestScore = 0;
  for (const el of $(SCORABLE_CONTAINERS).toArray()) {
    const score = scoreContainer($, el);
    if (score > bestScore) {
      best = el;
      bestScore = score;
    }
  }
  if (!best) return null;

  return {
    markdown: markdownConverter.convertToMarkdown($.html(best)),
    metadataTitle,
    pageTitle,
  };
});
