import { getLogger } from '../../../utils/logger';
import { errorMessage } from '../../errors';
import type { ContentItem } from '../../types';
import { buildContentItem, type ExtractedContent } from '../contentItem';

export const STRATEGY_NAMES = ['boilerplate', 'readability', 'dom'] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

/**
 * A synchronous, side-effect free page-to-item conversion. Implementations never
 * throw: a failure of any kind yields null.
 */
export interface ExtractionStrategy {
  readonly name: StrategyName;
  extract(url: string, html: string): ContentItem | null;
}

type ContentReader = (url: string, html: string) => ExtractedContent | null;

/** Wraps a reader with the shared guard, length floor, title resolution and classification. */
export function defineStrategy(name: StrategyName, read: ContentReader): ExtractionStrategy {
  return {
    name,
    extract(url: string, html: string): ContentItem | null {
      try {
        const extracted = read(url, html);
        return extracted ? buildContentItem(url, extracted) : null;
      } catch (error) {
        getLogger().debug({ event: 'strategy_failed', strategy: name, url, error: errorMessage(error) });
        return null;
      }
    },
  };
}

export function isStrategyName(value: string): value is StrategyName {
  return STRATEGY_NAMES.some(name => name === value);
}
