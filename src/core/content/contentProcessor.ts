import type pino from 'pino';
import { TEMPLATE_TITLE_PREFIX } from '../../config/constants';
import { getEnvironment } from '../../config/environment';
import { sha256Hex } from '../../utils/contentHash';
import { isLikelyBlogUrl } from '../discovery/contentUrlFilter';
import type { ContentItem } from '../types';
import { chunkItem } from './chunker';

export interface ContentProcessorOptions {
  log: pino.Logger;
  chunkSize?: number;
  /** A content hash shared by more items than this is treated as template output. */
  templateThreshold?: number;
}

/** Post-extraction pass: template filtering, exact-content dedup, then chunking. */
export class ContentProcessor {
  private readonly chunkSize: number;
  private readonly templateThreshold: number;
  private readonly log: pino.Logger;

  constructor(options: ContentProcessorOptions) {
    const env = getEnvironment();
    this.chunkSize = options.chunkSize ?? env.CHUNK_SIZE;
    this.templateThreshold = options.templateThreshold ?? env.TEMPLATE_DUPLICATE_THRESHOLD;
    this.log = options.log;
  }

  process(items: readonly ContentItem[]): ContentItem[] {
    const unique = this.deduplicate(items);
    const chunked = unique.flatMap(item => chunkItem(item, this.chunkSize));
    this.log.info({ event: 'processing_complete', input: items.length, unique: unique.length, output: chunked.length });
    return chunked;
  }

  deduplicate(items: readonly ContentItem[]): ContentItem[] {
    const hashes = items.map(item => sha256Hex(item.content));
    const counts = new Map<string, number>();
    hashes.forEach(hash => counts.set(hash, (counts.get(hash) ?? 0) + 1));

    const templateHashes = new Set(
      [...counts].filter(([, count]) => count > this.templateThreshold).map(([hash]) => hash)
    );

    let candidates = items.map((item, i) => ({ item, hash: hashes[i] }));
    if (templateHashes.size > 0) {
      this.log.warn(
        { event: 'template_content_detected', hashes: templateHashes.size },
        'Identical content served on many URLs'
      );
      candidates = candidates.filter(({ item, hash }) => {
        const drop = templateHashes.has(hash) && isLikelyBlogUrl(item.sourceUrl);
        if (drop) this.log.debug({ event: 'template_item_dropped', url: item.sourceUrl });
        return !drop;
      });

      if (candidates.length === 0 && items.length > 0) {
        const [first] = items;
        this.log.warn({ event: 'template_representative_kept', url: first.sourceUrl });
        return [{ ...first, title: `${TEMPLATE_TITLE_PREFIX}${first.title}` }];
      }
    }

    const seen = new Set<string>();
    const unique: ContentItem[] = [];
    for (const { item, hash } of candidates) {
      if (seen.has(hash)) {
        this.log.debug({ event: 'duplicate_dropped', url: item.sourceUrl, title: item.title });
        continue;
      }
      seen.add(hash);
      unique.push(item);
    }
    return unique;
  }
}
