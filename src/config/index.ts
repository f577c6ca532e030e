import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../identity/validator.js';
import { DEFAULT_CACHE_TTL_MS } from '../middleware/authenticate.js';

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (_, varName: string, defaultValue: string | undefined) => {
      const envValue = env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      return '';
    }
  );
}

/**
 * Recursively process an object and interpolate environment variables in string values
 */
function processEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => processEnvVars(item, env));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

const PostgresConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().default(5432),
  database: z.string().optional(),
  user: z.string().optional(),
  password: z.string().optional(),
  ssl: z.boolean().default(false),
  ssl_reject_unauthorized: z.boolean().default(true), // Set to false only for self-signed certs
  pool_size: z.number().default(10),
});

export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;

const ConfigSchema = z.object({
  proxy: z
    .object({
      listen_port: z.number().default(8080),
      listen_host: z.string().default('0.0.0.0'),
      upstream_url: z.string().url().default('http://127.0.0.1:8081'),
      timeout_ms: z.number().positive().default(30000),
      body_limit: z.number().positive().default(1048576),
    })
    .default({}),
  identity: z.object({
    endpoint: z.string().url(),
    timeout_ms: z.number().positive().default(DEFAULT_TIMEOUT_MS),
    user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
  }),
  cache: z
    .object({
      type: z.enum(['none', 'memory', 'sqlite', 'postgres']).default('memory'),
      ttl_seconds: z.number().positive().default(DEFAULT_CACHE_TTL_MS / 1000),
      max_memory_entries: z.number().int().positive().default(10000),
      path: z.string().default('./data/identity-cache.db'),
      cleanup_interval_seconds: z.number().positive().default(60),
      postgres: PostgresConfigSchema.optional(),
    })
    .default({}),
  rate_limit: z
    .object({
      enabled: z.boolean().default(false),
      max: z.number().int().positive().default(100),
      window_ms: z.number().int().min(1000).default(60000),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      format: z.enum(['json', 'pretty']).default('json'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type CacheConfig = Config['cache'];

type EnvParser = (raw: string) => unknown;

const asString: EnvParser = (raw) => raw;
const asInt: EnvParser = (raw) => parseInt(raw, 10);
const asBool: EnvParser = (raw) => raw === 'true';

// env var → config path; only variables that are set override the file
const ENV_OVERRIDES: Array<[string, string[], EnvParser]> = [
  ['PROXY_PORT', ['proxy', 'listen_port'], asInt],
  ['PROXY_HOST', ['proxy', 'listen_host'], asString],
  ['UPSTREAM_URL', ['proxy', 'upstream_url'], asString],
  ['PROXY_TIMEOUT_MS', ['proxy', 'timeout_ms'], asInt],
  ['IDENTITY_ENDPOINT', ['identity', 'endpoint'], asString],
  ['IDENTITY_TIMEOUT_MS', ['identity', 'timeout_ms'], asInt],
  ['IDENTITY_USER_AGENT', ['identity', 'user_agent'], asString],
  ['CACHE_TYPE', ['cache', 'type'], asString],
  ['CACHE_TTL_SECONDS', ['cache', 'ttl_seconds'], asInt],
  ['CACHE_MAX_MEMORY_ENTRIES', ['cache', 'max_memory_entries'], asInt],
  ['CACHE_PATH', ['cache', 'path'], asString],
  ['CACHE_CLEANUP_INTERVAL_SECONDS', ['cache', 'cleanup_interval_seconds'], asInt],
  ['POSTGRES_HOST', ['cache', 'postgres', 'host'], asString],
  ['POSTGRES_PORT', ['cache', 'postgres', 'port'], asInt],
  ['POSTGRES_DATABASE', ['cache', 'postgres', 'database'], asString],
  ['POSTGRES_USER', ['cache', 'postgres', 'user'], asString],
  ['POSTGRES_PASSWORD', ['cache', 'postgres', 'password'], asString],
  ['POSTGRES_SSL', ['cache', 'postgres', 'ssl'], asBool],
  ['POSTGRES_POOL_SIZE', ['cache', 'postgres', 'pool_size'], asInt],
  ['RATE_LIMIT_ENABLED', ['rate_limit', 'enabled'], asBool],
  ['RATE_LIMIT_MAX', ['rate_limit', 'max'], asInt],
  ['RATE_LIMIT_WINDOW_MS', ['rate_limit', 'window_ms'], asInt],
  ['LOG_LEVEL', ['logging', 'level'], asString],
  ['LOG_FORMAT', ['logging', 'format'], asString],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, path: string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

/**
 * Overlay environment variables onto a raw (pre-validation) config object.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  for (const [name, path, parse] of ENV_OVERRIDES) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      setPath(raw, path, parse(value));
    }
  }
  return raw;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  try {
    const parsed: unknown = parseYaml(readFileSync(configPath, 'utf-8'));
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      // Config file doesn't exist, rely on defaults and environment
      return {};
    }
    throw error;
  }
}

/**
 * Load the YAML file (missing file = empty), interpolate `${VAR}` references,
 * overlay environment variables and validate the result.
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Config {
  const processed = processEnvVars(readConfigFile(configPath), env);
  const raw = applyEnvOverrides(isRecord(processed) ? processed : {}, env);
  return ConfigSchema.parse(raw);
}

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}
