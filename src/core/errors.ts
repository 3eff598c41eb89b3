export type ScraperErrorCode =
  | 'TIMEOUT'
  | 'NETWORK'
  | 'EXTRACTION'
  | 'RENDER'
  | 'DISCOVERY'
  | 'CONFIGURATION'
  | 'VALIDATION'
  | 'INTERNAL';

export class ScraperError extends Error {
  readonly code: ScraperErrorCode;

  constructor(code: ScraperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TimeoutError extends ScraperError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('TIMEOUT', `${message} (timeout: ${timeoutMs}ms)`);
    this.timeoutMs = timeoutMs;
  }
}

export class NetworkError extends ScraperError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    const statusInfo = statusCode ? ` (status: ${statusCode})` : '';
    super('NETWORK', `Network error: ${message}${statusInfo}`, options);
    this.statusCode = statusCode;
  }
}

export class ExtractionError extends ScraperError {
  constructor(message: string, url?: string) {
    const urlInfo = url ? ` for URL: ${url}` : '';
    super('EXTRACTION', `Content extraction failed: ${message}${urlInfo}`);
  }
}

export class RenderError extends ScraperError {
  constructor(message: string, url?: string, options?: { cause?: unknown }) {
    const urlInfo = url ? ` for URL: ${url}` : '';
    super('RENDER', `Browser rendering failed: ${message}${urlInfo}`, options);
  }
}

export class DiscoveryError extends ScraperError {
  readonly stage: string;

  constructor(stage: string, message: string, options?: { cause?: unknown }) {
    super('DISCOVERY', `Discovery stage '${stage}' failed: ${message}`, options);
    this.stage = stage;
  }
}

export class ValidationError extends ScraperError {
  constructor(message: string) {
    super('VALIDATION', `Validation error: ${message}`);
  }
}

export class ConfigurationError extends ScraperError {
  constructor(message: string) {
    super('CONFIGURATION', `Configuration error: ${message}`);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function toScraperError(error: unknown, context?: string): ScraperError {
  if (error instanceof ScraperError) {
    return error;
  }

  const prefix = context ? `${context}: ` : '';

  if (error instanceof Error) {
    return new ScraperError('INTERNAL', `${prefix}${error.message}`, { cause: error });
  }

  return new ScraperError('INTERNAL', `${prefix}Unknown error occurred`);
}
