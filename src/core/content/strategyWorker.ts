import { parentPort } from 'worker_threads';
import { getStrategy } from './extractors';
import { WorkerRequestSchema, type WorkerReply } from './strategyMessages';

// Entry point of a strategy worker thread; loaded from the compiled output only.

const port = parentPort;
if (!port) {
  throw new Error('strategyWorker must be started as a worker thread');
}

port.on('message', (message: unknown) => {
  const parsed = WorkerRequestSchema.safeParse(message);
  if (!parsed.success) {
    throw new Error(`Malformed strategy request: ${parsed.error.message}`);
  }
  const { id, task } = parsed.data;
  const reply: WorkerReply = { id, item: getStrategy(task.strategy).extract(task.url, task.html) };
  port.postMessage(reply);
});
