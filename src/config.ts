import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import { MAX_PAGE_SIZE } from './query/compiler.js';

export const DEFAULT_API_VERSION = '2022-06-28';
export const DEFAULT_TIMEOUT_MS = 30_000;

const configSchema = z.object({
  /** Base URL of the remote API, e.g. `https://api.example.com/v1`. */
  apiUrl: z.string().url().optional(),
  token: z.string().min(1).optional(),
  apiVersion: z.string().min(1),
  timeoutMs: z.coerce.number().int().positive(),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE),
  logLevel: z.enum(LOG_LEVELS),
});

export type DocDbConfig = z.infer<typeof configSchema>;

export type ConfigOverrides = Partial<DocDbConfig>;

export type Environment = Record<string, string | undefined>;

function fromEnv(env: Environment, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Resolves configuration from explicit overrides, then `DOCDB_*` environment
 * variables, then defaults.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Environment = process.env): DocDbConfig {
  const parsed = configSchema.safeParse({
    apiUrl: overrides.apiUrl ?? fromEnv(env, 'DOCDB_API_URL'),
    token: overrides.token ?? fromEnv(env, 'DOCDB_API_TOKEN'),
    apiVersion: overrides.apiVersion ?? fromEnv(env, 'DOCDB_API_VERSION') ?? DEFAULT_API_VERSION,
    timeoutMs: overrides.timeoutMs ?? fromEnv(env, 'DOCDB_TIMEOUT_MS') ?? DEFAULT_TIMEOUT_MS,
    pageSize: overrides.pageSize ?? fromEnv(env, 'DOCDB_PAGE_SIZE') ?? MAX_PAGE_SIZE,
    logLevel: overrides.logLevel ?? fromEnv(env, 'DOCDB_LOG_LEVEL') ?? 'info',
  });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidArgumentError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
