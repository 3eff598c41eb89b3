#!/usr/bin/env node

import { writeFile } from 'fs/promises';
import { parseArgs } from 'util';
import { APP_NAME, APP_VERSION, DEFAULT_MAX_ITEMS } from './config/constants';
import { clearEnvironmentCache, validateEnvironment } from './config/environment';
import { ConfigurationError, ScraperError, errorMessage } from './core/errors';
import { scrapeSite, type ScrapeOptions } from './core/scraper';
import { serializeScrapeResult } from './core/types';
import { getLogger, resetLogger } from './utils/logger';

const HELP_TEXT = `
${APP_NAME} v${APP_VERSION}

Extract readable content from a website as JSON.

Usage: ${APP_NAME} <url> [options]

Options:
  --max-items <n>       Maximum number of pages to extract (default: ${DEFAULT_MAX_ITEMS})
  --browser, -b         Render pages in headless Chromium when plain HTTP is not enough
  --max-concurrent <n>  Maximum pages processed at once (default: MAX_CONCURRENT or 10)
  --chunk-size <n>      Target size of content chunks in characters (default: CHUNK_SIZE or 8000)
  --output, -o <file>   Write the JSON result to a file instead of stdout
  --verbose, -v         Debug logging on stderr
  --help, -h            Show help
  --version             Show version

Examples:
  ${APP_NAME} https://example.com/blog
  ${APP_NAME} https://example.com --browser --max-items 20 -o result.json
`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'scrape'; options: Omit<ScrapeOptions, 'signal'>; output?: string; verbose: boolean };

function parseInteger(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new ConfigurationError(`${flag} expects an integer, got '${value}'`);
  }
  return parsed;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        'max-items': { type: 'string' },
        browser: { type: 'boolean', short: 'b' },
        'max-concurrent': { type: 'string' },
        'chunk-size': { type: 'string' },
        output: { type: 'string', short: 'o' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new ConfigurationError(errorMessage(error));
  }
}

export function parseCliOptions(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  if (positionals.length !== 1) {
    throw new ConfigurationError('Expected exactly one URL argument. Use --help for usage information.');
  }

  return {
    kind: 'scrape',
    options: {
      baseUrl: positionals[0],
      maxItems: parseInteger(values['max-items'], '--max-items'),
      useBrowser: values.browser ?? false,
      maxConcurrent: parseInteger(values['max-concurrent'], '--max-concurrent'),
      chunkSize: parseInteger(values['chunk-size'], '--chunk-size'),
    },
    output: values.output,
    verbose: values.verbose ?? false,
  };
}

async function main(): Promise<void> {
  const command = parseCliOptions(process.argv.slice(2));

  if (command.kind === 'help') {
    console.log(HELP_TEXT);
    return;
  }
  if (command.kind === 'version') {
    console.log(`${APP_NAME} v${APP_VERSION}`);
    return;
  }

  if (command.verbose) {
    process.env.LOG_LEVEL = 'debug';
    clearEnvironmentCache();
    resetLogger();
  }
  validateEnvironment();

  const controller = new AbortController();
  process.once('SIGINT', () => {
    getLogger().warn({ event: 'cli_interrupted' }, 'Interrupted, stopping scrape');
    controller.abort();
  });

  const result = await scrapeSite({ ...command.options, signal: controller.signal });
  const json = JSON.stringify(serializeScrapeResult(result), null, 2);

  if (command.output) {
    await writeFile(command.output, `${json}\n`, 'utf8');
    console.error(`Wrote ${result.items.length} items to ${command.output}`);
  } else {
    process.stdout.write(`${json}\n`);
  }
}

if (require.main === module) {
  main().catch(error => {
    getLogger().error({ event: 'cli_failed', error: errorMessage(error) }, 'CLI execution failed');
    const prefix = error instanceof ScraperError ? '' : 'Fatal error: ';
    console.error(`${prefix}${errorMessage(error)}`);
    process.exit(1);
  });
}
