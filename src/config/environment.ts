import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvironmentSchema = z.object({
  // Network timeouts
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  SITEMAP_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  DISCOVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // Browser rendering
  RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RENDER_SETTLE_MS: z.coerce.number().int().min(0).default(2000),
  CHROMIUM_PATH: z.string().optional(),

  // Pipeline sizing
  MAX_CONCURRENT: z.coerce.number().int().min(1).max(50).default(10),
  CHUNK_SIZE: z.coerce.number().int().positive().default(8000),
  TEMPLATE_DUPLICATE_THRESHOLD: z.coerce.number().int().min(1).default(3),

  // Strategy execution mode
  EXTRACTION_WORKERS: z.coerce.number().int().min(1).max(8).default(3),
  EXTRACTION_MODE: z.enum(['inline', 'thread']).default('thread'),

  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Environment = z.infer<typeof EnvironmentSchema>;
export type LogLevel = (typeof LOG_LEVELS)[number];

let cachedEnvironment: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  try {
    const env = EnvironmentSchema.parse(process.env);
    cachedEnvironment = env;
    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

export function validateEnvironment(): void {
  getEnvironment(); // This will throw if validation fails
}

export function getLogLevel(): LogLevel {
  const env = getEnvironment();
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'development' ? 'debug' : 'info';
}

// For testing purposes
export function clearEnvironmentCache(): void {
  cachedEnvironment = null;
}
