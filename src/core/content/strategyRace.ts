import type pino from 'pino';
import { CONTENT_THRESHOLDS } from '../../config/constants';
import { errorMessage } from '../errors';
import type { ContentItem } from '../types';
import type { StrategyName } from './extractors';
import type { StrategyPool } from './strategyPool';

export interface RaceWinner {
  item: ContentItem;
  strategy: StrategyName;
}

export interface RaceOptions {
  strategies: readonly StrategyName[];
  signal?: AbortSignal;
  log?: pino.Logger;
  minLength?: number;
}

/**
 * Submits every strategy to the pool and settles on the first result whose trimmed
 * content is longer than `minLength`. The losers are cancelled as soon as one wins.
 */
export async function raceStrategies(
  pool: StrategyPool,
  url: string,
  html: string,
  options: RaceOptions
): Promise<RaceWinner | null> {
  const minLength = options.minLength ?? CONTENT_THRESHOLDS.MIN_WINNING_LENGTH;
  const controller = new AbortController();
  const signal = options.signal ? AbortSignal.any([options.signal, controller.signal]) : controller.signal;

  try {
    return await new Promise<RaceWinner | null>(resolve => {
      const runs = options.strategies.map(strategy =>
        pool
          .run({ strategy, url, html }, signal)
          .then(item => {
            if (item && item.content.trim().length > minLength) {
              resolve({ item, strategy });
            }
          })
          .catch((error: unknown) => {
            options.log?.debug({ event: 'strategy_run_failed', strategy, url, error: errorMessage(error) });
          })
      );
      // Resolving again after a winner is a no-op
      void Promise.all(runs).then(() => resolve(null));
    });
  } finally {
    controller.abort();
  }
}
