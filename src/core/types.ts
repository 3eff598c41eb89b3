export const CONTENT_TYPES = [
  'blog',
  'tutorial',
  'book',
  'news',
  'podcast_transcript',
  'call_transcript',
  'linkedin_post',
  'reddit_comment',
] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export interface ContentItem {
  readonly title: string;
  readonly content: string;
  readonly contentType: ContentType;
  readonly sourceUrl: string;
}

export interface ScrapeResult {
  site: string;
  items: ContentItem[];
}

export interface SerializedContentItem {
  title: string;
  content: string;
  content_type: ContentType;
  source_url: string;
}

export interface SerializedScrapeResult {
  site: string;
  items: SerializedContentItem[];
}

export function serializeScrapeResult(result: ScrapeResult): SerializedScrapeResult {
  return {
    site: result.site,
    items: result.items.map(item => ({
      title: item.title,
      content: item.content,
      content_type: item.contentType,
      source_url: item.sourceUrl,
    })),
  };
}
