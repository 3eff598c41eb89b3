import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import {
  CONTENT_SELECTORS,
  LAYOUT_SELECTORS,
  POST_TITLE_SELECTORS,
  SEMANTIC_CONTENT_TAGS,
} from './selectors';
import { markdownConverter } from './markdownConverter';
import { defineStrategy } from './strategy';

const MAX_LINK_DENSITY = 0.3;
const MIN_BLOCK_TEXT = 200;

function linkDensity($: cheerio.CheerioAPI, block: cheerio.Cheerio<AnyNode>): number {
  const total = block.text().length;
  if (total === 0) return 1;
  const linked = block
    .find('a')
    .toArray()
    .reduce((sum, a) => sum + $(a).text().length, 0);
  return linked / total;
}

/** `main`, `article`, a known content selector, or else the largest low-link text block. */
export function findMainContent($: cheerio.CheerioAPI): cheerio.Cheerio<AnyNode> | undefined {
  for (const selector of [...SEMANTIC_CONTENT_TAGS, ...CONTENT_SELECTORS]) {
    const match = $(selector).first();
    if (match.length > 0) return match;
  }

  let best: cheerio.Cheerio<AnyNode> | undefined;
  let bestLength = MIN_BLOCK_TEXT;
  $('div, section').each((_, el) => {
    const block = $(el);
    const length = block.text().length;
    if (length > bestLength && linkDensity($, block) < MAX_LINK_DENSITY) {
      best = block;
      bestLength = length;
    }
  });
  return best;
}

export const domStrategy = defineStrategy('dom', (_url, html) => {
  const $ = cheerio.load(html);
  const pageTitle = $('title').first().text().trim() || undefined;

  $(LAYOUT_SELECTORS).remove();

  const metadataTitle = POST_TITLE_SELECTORS.map(selector => $(selector).first().text().trim()).find(
    title => title.length > 0
  );

  const main = findMainContent($);
  if (!main) return null;

  return {
    markdown: markdownConverter.convertToMarkdown($.html(main)),
    metadataTitle,
    pageTitle,
  };
});
