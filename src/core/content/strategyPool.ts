import { existsSync } from 'fs';
import { join } from 'path';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { Worker } from 'worker_threads';
import pLimit from 'p-limit';
import type pino from 'pino';
import { errorMessage } from '../errors';
import type { ContentItem } from '../types';
import { getStrategy, type ExtractionStrategy, type StrategyName } from './extractors';
import { WorkerReplySchema, type StrategyTask, type WorkerRequest } from './strategyMessages';

export type { StrategyTask } from './strategyMessages';

/**
 * Bounded executor for strategy runs. A task whose signal is aborted before it
 * starts never runs; one aborted while running resolves null and its result is dropped.
 */
export interface StrategyPool {
  run(task: StrategyTask, signal?: AbortSignal): Promise<ContentItem | null>;
  close(): Promise<void>;
}

export type StrategyResolver = (name: StrategyName) => ExtractionStrategy;

/** Runs strategies on the event loop, at most `size` at a time, yielding between tasks. */
export class InlineStrategyPool implements StrategyPool {
  private readonly limit: pLimit.Limit;

  constructor(
    size: number,
    private readonly resolveStrategy: StrategyResolver = getStrategy
  ) {
    this.limit = pLimit(size);
  }

  run(task: StrategyTask, signal?: AbortSignal): Promise<ContentItem | null> {
    return this.limit(async () => {
      if (signal?.aborted) return null;
      await yieldToEventLoop();
      if (signal?.aborted) return null;
      return this.resolveStrategy(task.strategy).extract(task.url, task.html);
    });
  }

  async close(): Promise<void> {
    this.limit.clearQueue();
  }
}

/** The slice of worker_threads.Worker the thread pool relies on. */
export interface StrategyWorkerHandle {
  postMessage(message: WorkerRequest): void;
  on(event: 'message', listener: (message: unknown) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'exit', listener: (code: number) => void): this;
  terminate(): Promise<number>;
}

export type WorkerFactory = () => StrategyWorkerHandle;

interface QueuedTask {
  id: number;
  task: StrategyTask;
  signal?: AbortSignal;
  resolve: (item: ContentItem | null) => void;
  detach: () => void;
}

interface PoolSlot {
  worker: StrategyWorkerHandle;
  current?: QueuedTask;
}

/** Runs strategies on `size` worker threads fed from a FIFO queue. */
export class ThreadStrategyPool implements StrategyPool {
  private readonly slots: PoolSlot[] = [];
  private readonly queue: QueuedTask[] = [];
  private nextId = 0;
  private closed = false;

  constructor(
    size: number,
    private readonly createWorker: WorkerFactory,
    private readonly log: pino.Logger
  ) {
    for (let i = 0; i < size; i++) this.slots.push(this.spawn());
    this.log.debug({ event: 'strategy_pool_started', mode: 'thread', size });
  }

  run(task: StrategyTask, signal?: AbortSignal): Promise<ContentItem | null> {
    if (this.closed || signal?.aborted) return Promise.resolve(null);

    return new Promise(resolve => {
      const entry: QueuedTask = { id: this.nextId++, task, signal, resolve, detach: () => undefined };

      if (signal) {
        const onAbort = (): void => this.abandon(entry);
        signal.addEventListener('abort', onAbort, { once: true });
        entry.detach = () => signal.removeEventListener('abort', onAbort);
      }

      this.queue.push(entry);
      this.dispatch();
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const entry of this.queue.splice(0)) this.settle(entry, null);
    for (const slot of this.slots) {
      if (slot.current) this.settle(slot.current, null);
    }
    const results = await Promise.allSettled(this.slots.map(slot => slot.worker.terminate()));
    results.forEach(result => {
      if (result.status === 'rejected') {
        this.log.warn({ event: 'strategy_worker_terminate_failed', error: errorMessage(result.reason) });
      }
    });
    this.slots.length = 0;
  }

  private spawn(): PoolSlot {
    const slot: PoolSlot = { worker: this.createWorker() };

    slot.worker.on('message', message => {
      const parsed = WorkerReplySchema.safeParse(message);
      const entry = slot.current;
      if (!entry) return;
      slot.current = undefined;
      if (!parsed.success || parsed.data.id !== entry.id) {
        this.log.warn({ event: 'strategy_worker_bad_reply', taskId: entry.id });
        this.settle(entry, null);
      } else {
        this.settle(entry, parsed.data.item);
      }
      this.dispatch();
    });

    slot.worker.on('error', error => {
      this.log.warn({ event: 'strategy_worker_error', error: error.message }, 'Strategy worker failed');
    });

    slot.worker.on('exit', code => {
      const index = this.slots.indexOf(slot);
      if (index === -1) return;
      if (slot.current) this.settle(slot.current, null);
      slot.current = undefined;
      if (this.closed) return;
      this.log.warn({ event: 'strategy_worker_exited', code }, 'Replacing strategy worker');
      this.slots[index] = this.spawn();
      this.dispatch();
    });

    return slot;
  }

  private dispatch(): void {
    for (const slot of this.slots) {
      if (slot.current) continue;
      const entry = this.queue.shift();
      if (!entry) return;
      slot.current = entry;
      slot.worker.postMessage({ id: entry.id, task: entry.task });
    }
  }

  private abandon(entry: QueuedTask): void {
    const queued = this.queue.indexOf(entry);
    if (queued !== -1) this.queue.splice(queued, 1);
    // A running task keeps its worker busy until the reply arrives; only its result is dropped
    this.settle(entry, null);
  }

  private settle(entry: QueuedTask, item: ContentItem | null): void {
    entry.detach();
    entry.resolve(entry.signal?.aborted ? null : item);
  }
}

export type ExtractionMode = 'inline' | 'thread';

export interface StrategyPoolOptions {
  mode: ExtractionMode;
  size: number;
  log: pino.Logger;
  workerFactory?: WorkerFactory;
}

export function resolveWorkerPath(): string | undefined {
  const compiled = join(__dirname, 'strategyWorker.js');
  return existsSync(compiled) ? compiled : undefined;
}

export function createStrategyPool(options: StrategyPoolOptions): StrategyPool {
  if (options.mode === 'inline') {
    return new InlineStrategyPool(options.size);
  }

  if (options.workerFactory) {
    return new ThreadStrategyPool(options.size, options.workerFactory, options.log);
  }

  const workerPath = resolveWorkerPath();
  if (!workerPath) {
    options.log.warn(
      { event: 'strategy_worker_missing', searched: join(__dirname, 'strategyWorker.js') },
      'Compiled strategy worker not found, running strategies inline'
    );
    return new InlineStrategyPool(options.size);
  }
  return new ThreadStrategyPool(options.size, () => new Worker(workerPath), options.log);
}
