import { describe, test, expect } from '@jest/globals';
import { setTimeout as delay } from 'timers/promises';
import { InlineStrategyPool, type StrategyPool } from '../../../../src/core/content/strategyPool';
import { raceStrategies } from '../../../../src/core/content/strategyRace';
import type { ExtractionStrategy, StrategyName } from '../../../../src/core/content/extractors';
import type { StrategyTask } from '../../../../src/core/content/strategyMessages';
import type { ContentItem } from '../../../../src/core/types';

const PAGE_URL = 'https://example.com/blog/a';
const ALL: StrategyName[] = ['boilerplate', 'readability', 'dom'];

function item(strategy: string, length: number): ContentItem {
  return { title: strategy, content: 'x'.repeat(length), contentType: 'blog', sourceUrl: PAGE_URL };
}

interface Scripted {
  afterMs: number;
  result: ContentItem | null | Error;
}

/** Pool whose strategies answer after a fixed delay; records the signal each run saw. */
class ScriptedPool implements StrategyPool {
  readonly signals: AbortSignal[] = [];

  constructor(private readonly script: Partial<Record<StrategyName, Scripted>>) {}

  async run(task: StrategyTask, signal?: AbortSignal): Promise<ContentItem | null> {
    if (signal) this.signals.push(signal);
    const step = this.script[task.strategy];
    if (!step) return null;
    await delay(step.afterMs);
    if (step.result instanceof Error) throw step.result;
    return step.result;
  }

  async close(): Promise<void> {}
}

describe('raceStrategies', () => {
  test('the first long enough result wins, whatever the order', async () => {
    const pool = new ScriptedPool({
      boilerplate: { afterMs: 40, result: item('boilerplate', 500) },
      readability: { afterMs: 5, result: item('readability', 300) },
      dom: { afterMs: 1, result: item('dom', 50) },
    });

    const winner = await raceStrategies(pool, PAGE_URL, '<html></html>', { strategies: ALL });

    expect(winner?.strategy).toBe('readability');
    expect(winner?.item.title).toBe('readability');
  });

  test('content must be longer than 200 trimmed characters', async () => {
    const padded: ContentItem = { ...item('dom', 200), content: `   ${'x'.repeat(200)}   ` };
    const pool = new ScriptedPool({ dom: { afterMs: 1, result: padded } });

    await expect(raceStrategies(pool, PAGE_URL, '', { strategies: ALL })).resolves.toBeNull();
  });

  test('honours a custom minimum length', async () => {
    const pool = new ScriptedPool({ dom: { afterMs: 1, result: item('dom', 60) } });
    const winner = await raceStrategies(pool, PAGE_URL, '', { strategies: ALL, minLength: 50 });
    expect(winner?.strategy).toBe('dom');
  });

  test('a failing run is ignored', async () => {
    const pool = new ScriptedPool({
      boilerplate: { afterMs: 1, result: new Error('worker crashed') },
      dom: { afterMs: 5, result: item('dom', 400) },
    });

    const winner = await raceStrategies(pool, PAGE_URL, '', { strategies: ALL });
    expect(winner?.strategy).toBe('dom');
  });

  test('losers see their signal aborted once a winner is chosen', async () => {
    const pool = new ScriptedPool({
      boilerplate: { afterMs: 1, result: item('boilerplate', 400) },
      dom: { afterMs: 30, result: item('dom', 400) },
    });

    await raceStrategies(pool, PAGE_URL, '', { strategies: ALL });

    expect(pool.signals).toHaveLength(3);
    expect(pool.signals.every(signal => signal.aborted)).toBe(true);
  });

  test('queued strategies never start after a winner', async () => {
    const calls: StrategyName[] = [];
    const resolver = (name: StrategyName): ExtractionStrategy => ({
      name,
      extract: () => {
        calls.push(name);
        return item(name, 400);
      },
    });
    const pool = new InlineStrategyPool(1, resolver);

    const winner = await raceStrategies(pool, PAGE_URL, '', { strategies: ALL });
    // let the pool drain the queued runs
    await delay(20);

    expect(winner?.strategy).toBe('boilerplate');
    expect(calls).toEqual(['boilerplate']);
  });

  test('an aborted caller gets no winner', async () => {
    const controller = new AbortController();
    controller.abort();
    const pool = new InlineStrategyPool(3);

    await expect(raceStrategies(pool, PAGE_URL, '<html></html>', { strategies: ALL, signal: controller.signal })).resolves.toBeNull();
  });
});
