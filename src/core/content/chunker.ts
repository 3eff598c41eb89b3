import { CHUNKING } from '../../config/constants';
import type { ContentItem } from '../types';

/**
 * Greedily packs `\n\n`-separated paragraphs into chunks of at most `chunkSize`
 * characters. A single paragraph longer than that becomes a chunk on its own.
 * Joining the result with `\n\n` gives back the input.
 */
export function packParagraphs(content: string, chunkSize: number): string[] {
  const chunks: string[] = [];
  let current: string | undefined;

  for (const paragraph of content.split(CHUNKING.PARAGRAPH_SEPARATOR)) {
    if (current === undefined) {
      current = paragraph;
      continue;
    }
    const candidate = current + CHUNKING.PARAGRAPH_SEPARATOR + paragraph;
    if (candidate.length > chunkSize && current.length > 0) {
      chunks.push(current);
      current = paragraph;
    } else {
      current = candidate;
    }
  }

  if (current !== undefined && current.length > 0) chunks.push(current);
  return chunks.length > 0 ? chunks : [content];
}

/**
 * Splits an oversized item into at most three `(Part i)` items. Items that are small
 * enough, or that would split into too many or too short pieces, come back unchanged.
 */
export function chunkItem(item: ContentItem, chunkSize: number): ContentItem[] {
  if (item.content.length <= chunkSize * CHUNKING.SPLIT_FACTOR) return [item];

  const chunks = packParagraphs(item.content, chunkSize);
  const acceptable =
    chunks.length <= CHUNKING.MAX_CHUNKS && chunks.every(chunk => chunk.length > CHUNKING.MIN_CHUNK_LENGTH);
  if (!acceptable || chunks.length === 1) return [item];

  return chunks.map((content, i) => ({
    title: `${item.title} (Part ${i + 1})`,
    content,
    contentType: item.contentType,
    sourceUrl: item.sourceUrl,
  }));
}
