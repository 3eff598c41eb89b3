import { describe, test, expect } from '@jest/globals';
import pino from 'pino';
import { Writable } from 'stream';
import { generateCorrelationId, getLogger, resetLogger, withTiming } from '../../../src/utils/logger';

function capture(): { log: pino.Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, done) {
      lines.push(JSON.parse(chunk.toString()));
      done();
    },
  });
  return { log: pino({ level: 'debug' }, stream), lines };
}

describe('logger', () => {
  test('correlation ids carry their prefix', () => {
    expect(generateCorrelationId()).toMatch(/^scrape-\d+-[a-z0-9]+$/);
    expect(generateCorrelationId('http')).toMatch(/^http-/);
  });

  test('getLogger caches until reset', () => {
    const first = getLogger();
    expect(getLogger()).toBe(first);
    resetLogger();
    expect(getLogger()).not.toBe(first);
  });

  test('withTiming logs the outcome and returns the result', async () => {
    const { log, lines } = capture();

    await expect(withTiming(log, 'discovery', async () => 7, { stage: 'sitemap' })).resolves.toBe(7);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ event: 'discovery', status: 'ok', stage: 'sitemap' });
  });

  test('withTiming logs and rethrows failures', async () => {
    const { log, lines } = capture();

    await expect(
      withTiming(log, 'discovery', async () => {
        throw new Error('stage down');
      })
    ).rejects.toThrow('stage down');

    expect(lines[0]).toMatchObject({ event: 'discovery', msg: 'failed', level: 40 });
  });
});
