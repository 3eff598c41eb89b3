import { describe, test, expect } from '@jest/globals';
import { parseCliOptions } from '../../src/cli';
import { ConfigurationError } from '../../src/core/errors';

describe('parseCliOptions', () => {
  test('parses a bare URL with defaults left to the scraper', () => {
    expect(parseCliOptions(['https://example.com'])).toEqual({
      kind: 'scrape',
      options: {
        baseUrl: 'https://example.com',
        maxItems: undefined,
        useBrowser: false,
        maxConcurrent: undefined,
        chunkSize: undefined,
      },
      output: undefined,
      verbose: false,
    });
  });

  test('parses every option', () => {
    const command = parseCliOptions([
      'https://example.com/blog',
      '--max-items',
      '20',
      '--browser',
      '--max-concurrent',
      '4',
      '--chunk-size',
      '5000',
      '-o',
      'result.json',
      '-v',
    ]);

    expect(command).toEqual({
      kind: 'scrape',
      options: {
        baseUrl: 'https://example.com/blog',
        maxItems: 20,
        useBrowser: true,
        maxConcurrent: 4,
        chunkSize: 5000,
      },
      output: 'result.json',
      verbose: true,
    });
  });

  test('short flags', () => {
    const command = parseCliOptions(['-b', 'https://example.com']);
    expect(command.kind === 'scrape' && command.options.useBrowser).toBe(true);
  });

  test('help and version win over a missing URL', () => {
    expect(parseCliOptions(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliOptions(['-h'])).toEqual({ kind: 'help' });
    expect(parseCliOptions(['--version'])).toEqual({ kind: 'version' });
  });

  test('requires exactly one URL', () => {
    expect(() => parseCliOptions([])).toThrow(ConfigurationError);
    expect(() => parseCliOptions(['https://a.example', 'https://b.example'])).toThrow(
      'Configuration error: Expected exactly one URL argument. Use --help for usage information.'
    );
  });

  test('rejects non-integer numbers', () => {
    expect(() => parseCliOptions(['https://example.com', '--max-items', 'ten'])).toThrow(
      "Configuration error: --max-items expects an integer, got 'ten'"
    );
    expect(() => parseCliOptions(['https://example.com', '--chunk-size', '1.5'])).toThrow(ConfigurationError);
  });

  test('rejects unknown flags', () => {
    expect(() => parseCliOptions(['https://example.com', '--depth', '3'])).toThrow(ConfigurationError);
  });
});
