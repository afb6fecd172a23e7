import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import logger from './logger';
import { Env, loadEnv } from './env';
import { ConfigError, errorMessage } from './errors';
import { DEFAULT_SCHEDULE_URL, DEFAULT_OUTPUT_FILE, DEFAULT_CALENDAR_NAME } from './constants';

// --- Zod Schemas ---

const SourceSchema = z.object({
  url: z.string().url().default(DEFAULT_SCHEDULE_URL),
  maxPages: z.number().int().positive().default(10),
  maxMovies: z.number().int().positive().optional(),
  skipDetails: z.boolean().default(false),
});

// All delays are in seconds
const HttpSchema = z.object({
  baseDelay: z.number().nonnegative().default(5),
  pageDelay: z.number().nonnegative().default(8),
  detailDelay: z.number().nonnegative().default(12),
  jitter: z.number().min(1).default(3),
  backoffFactor: z.number().min(1).default(3),
  maxRetries: z.number().int().positive().default(3),
  timeoutSeconds: z.number().positive().default(45),
  // Requests in flight against the schedule host. 1 keeps the run strictly sequential.
  concurrency: z.number().int().min(1).max(4).default(1),
  userAgent: z.string().optional(),
});

const CalendarSchema = z.object({
  name: z.string().default(DEFAULT_CALENDAR_NAME),
  output: z.string().min(1).default(DEFAULT_OUTPUT_FILE),
  excludeCountries: z.array(z.string()).default(['Россия']),
});

const ConfigSchema = z.object({
  source: SourceSchema.default({}),
  http: HttpSchema.default({}),
  calendar: CalendarSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SourceConfig = Config['source'];
export type HttpConfig = Config['http'];
export type CalendarConfig = Config['calendar'];

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type FrozenConfig = DeepReadonly<Config>;

// --- Loader Logic ---

function readConfigFile(candidates: string[]): unknown {
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) continue;

    logger.info(`Loading configuration from ${candidate}`);
    try {
      const fileContents = fs.readFileSync(candidate, 'utf8');
      return yaml.load(fileContents) ?? {};
    } catch (e: unknown) {
      throw new ConfigError(`Failed to parse ${candidate}: ${errorMessage(e)}`);
    }
  }

  logger.info('No config.yaml found. Using Environment Variables only.');
  return {};
}

function applyEnv(config: Config, values: Env): void {
  if (values.SCHEDULE_URL) config.source.url = values.SCHEDULE_URL;
  if (values.MAX_PAGES !== undefined) config.source.maxPages = values.MAX_PAGES;
  if (values.MAX_MOVIES !== undefined) config.source.maxMovies = values.MAX_MOVIES;
  if (values.SKIP_DETAILS !== undefined) config.source.skipDetails = values.SKIP_DETAILS;
  if (values.BASE_DELAY !== undefined) config.http.baseDelay = values.BASE_DELAY;
  if (values.HTTP_CONCURRENCY !== undefined) config.http.concurrency = values.HTTP_CONCURRENCY;
  if (values.EXCLUDE_COUNTRIES !== undefined) config.calendar.excludeCountries = values.EXCLUDE_COUNTRIES;
  if (values.OUTPUT_FILE) config.calendar.output = values.OUTPUT_FILE;
}

function deepFreeze(value: unknown): void {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
}

/**
 * Builds the run configuration: optional YAML file first, environment on top.
 * Invalid environment or file contents raise ConfigError.
 * The returned object is frozen and handed to each component explicitly.
 */
function loadConfig(values: Env = loadEnv(), cwd: string = process.cwd()): FrozenConfig {
  const candidates = values.CONFIG_PATH
    ? [path.resolve(cwd, values.CONFIG_PATH)]
    : [path.resolve(cwd, 'config', 'config.yaml'), path.resolve(cwd, 'config.yaml')];

  const loadedConfig = readConfigFile(candidates);

  const result = ConfigSchema.safeParse(loadedConfig);
  if (!result.success) {
    const issues = result.error.issues.map(err => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError('Configuration validation failed', issues);
  }

  const config = result.data;
  applyEnv(config, values);
  deepFreeze(config);

  return config;
}

export { loadConfig, ConfigSchema };
