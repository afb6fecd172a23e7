import { z } from 'zod';
import { ConfigError } from './errors';

const optionalNumber = z.string().optional().transform(val => val ? Number(val) : undefined);
const optionalBoolean = z.string().optional().transform(val => val === undefined ? undefined : val.toLowerCase() === 'true');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'trace']).default('info'),
  SCHEDULE_URL: z.string().url().optional(),
  MAX_PAGES: optionalNumber.pipe(z.number().int().positive().optional()),
  MAX_MOVIES: optionalNumber.pipe(z.number().int().positive().optional()),
  BASE_DELAY: optionalNumber.pipe(z.number().nonnegative().optional()),
  HTTP_CONCURRENCY: optionalNumber.pipe(z.number().int().min(1).max(4).optional()),
  // Comma separated, e.g. "Россия,США"
  EXCLUDE_COUNTRIES: z.string().optional().transform(val => {
    if (val === undefined) return undefined;
    return val.split(',').map(c => c.trim()).filter(c => c.length > 0);
  }),
  SKIP_DETAILS: optionalBoolean,
  OUTPUT_FILE: z.string().min(1).optional(),
  CONFIG_PATH: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): z.SafeParseReturnType<unknown, Env> {
  return envSchema.safeParse(source);
}

/**
 * Validated environment. Throws ConfigError instead of exiting so the caller
 * can still leave a calendar file behind.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = parseEnv(source);

  if (!result.success) {
    const issues = result.error.issues.map(error => `${error.path.join('.')}: ${error.message}`);
    throw new ConfigError('Environment validation failed', issues);
  }

  return result.data;
}

// Usable even when the rest of the environment is invalid
export const logLevel = envSchema.shape.LOG_LEVEL.catch('info').parse(process.env.LOG_LEVEL);

export function outputFileOverride(source: NodeJS.ProcessEnv = process.env): string | undefined {
  return envSchema.shape.OUTPUT_FILE.catch(undefined).parse(source.OUTPUT_FILE);
}
