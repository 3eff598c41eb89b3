import { CONTENT_THRESHOLDS } from '../../config/constants';
import type { ContentItem } from '../types';
import { classifyContent } from './classifier';

export const UNTITLED = 'Untitled';

/** What a strategy pulled out of a page before it becomes a ContentItem. */
export interface ExtractedContent {
  markdown: string;
  /** Title the strategy found in page metadata (og:title, Readability, .entry-title...). */
  metadataTitle?: string;
  /** The document `<title>`. */
  pageTitle?: string;
}

export function firstMarkdownHeading(markdown: string): string | undefined {
  for (const line of markdown.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('# ')) {
      const heading = trimmed.slice(2).trim();
      if (heading) return heading;
    }
  }
  return undefined;
}

export function resolveTitle(extracted: ExtractedContent): string {
  const candidates = [
    extracted.metadataTitle,
    firstMarkdownHeading(extracted.markdown),
    extracted.pageTitle,
  ];
  for (const candidate of candidates) {
    const title = candidate?.replace(/\s+/g, ' ').trim();
    if (title) return title;
  }
  return UNTITLED;
}

/** Null when the trimmed content is too short to be worth keeping. */
export function buildContentItem(url: string, extracted: ExtractedContent): ContentItem | null {
  const content = extracted.markdown.trim();
  if (content.length < CONTENT_THRESHOLDS.MIN_ITEM_LENGTH) return null;

  const title = resolveTitle(extracted);
  return {
    title,
    content,
    contentType: classifyContent(url, title, content),
    sourceUrl: url,
  };
}
