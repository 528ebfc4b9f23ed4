import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';
import { DEFAULT_API_URL, DEFAULT_REGION, DEFAULT_SERVICE, DEFAULT_TIMEOUT_MS } from './constants.js';
import type { LogLevel } from './types/logger.js';

export interface ProbeConfig {
  apiUrl: string;
  apiKey: string;
  region: string;
  service: string;
  timeoutMs: number;
  logLevel: LogLevel;
}

const envSchema = z.object({
  API_URL: z.string().url().default(DEFAULT_API_URL),
  API_KEY: z.string().default(''),
  AWS_REGION: z.string().optional(),
  AWS_DEFAULT_REGION: z.string().optional(),
  SIGV4_SERVICE: z.string().default(DEFAULT_SERVICE),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'none']).default('info'),
});

const configKeys = Object.keys(envSchema.shape);

export interface EnvFileResult {
  path: string;
  found: boolean;
  /**
   * Every pair parsed from the file, including ones already set in the environment
   */
  variables: Record<string, string>;
}

/**
 * Parse KEY=value lines. Blank lines and `#` comments are skipped, an
 * optional `export ` prefix is dropped, surrounding quotes are removed and
 * unquoted values lose a trailing ` # comment`.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const variables: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const match = trimmed.match(/^(?:export\s+)?([^=\s]+)\s*=(.*)$/);
    if (!match) continue;

    const [, key, value] = match;
    variables[key] = cleanEnvValue(value);
  }

  return variables;
}

/**
 * Quoted values end at the closing quote; unquoted values lose a trailing ` # comment`
 */
function cleanEnvValue(raw: string): string {
  const value = raw.trim();
  const quote = value[0];
  if (quote === '"' || quote === "'") {
    const end = value.indexOf(quote, 1);
    if (end > 0) {
      return value.slice(1, end);
    }
  }
  return value.replace(/\s+#.*$/, '');
}

/**
 * Load a .env file into `env`. Variables already set are left alone.
 * A missing file is not an error.
 */
export function loadEnvFile(filePath?: string, env: NodeJS.ProcessEnv = process.env): EnvFileResult {
  const path = filePath ?? join(process.cwd(), '.env');

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { path, found: false, variables: {} };
    }
    throw new ConfigurationError(
      `Cannot read env file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { configKey: 'envFile' }
    );
  }

  const variables = parseEnvFile(content);
  for (const [key, value] of Object.entries(variables)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }

  return { path, found: true, variables };
}

/**
 * Validate the environment into a {@link ProbeConfig}.
 * Empty values count as unset. `overrides` (CLI flags) win over the environment.
 *
 * @throws {ConfigurationError} naming the first invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<ProbeConfig> = {}): ProbeConfig {
  const input: Record<string, string> = {};
  for (const key of configKeys) {
    const value = env[key]?.trim();
    if (value) input[key] = value;
  }

  const parsed = envSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = String(issue?.path[0] ?? 'environment');
    throw new ConfigurationError(`Invalid ${key}: ${issue?.message ?? 'invalid value'}`, { configKey: key });
  }

  if (overrides.apiUrl && !envSchema.shape.API_URL.safeParse(overrides.apiUrl).success) {
    throw new ConfigurationError(`Invalid API_URL: ${overrides.apiUrl}`, { configKey: 'API_URL' });
  }

  const data = parsed.data;
  return {
    apiUrl: overrides.apiUrl || data.API_URL,
    apiKey: overrides.apiKey || data.API_KEY,
    region: overrides.region || data.AWS_REGION || data.AWS_DEFAULT_REGION || DEFAULT_REGION,
    service: overrides.service || data.SIGV4_SERVICE,
    timeoutMs: overrides.timeoutMs ?? data.REQUEST_TIMEOUT_MS,
    logLevel: overrides.logLevel ?? data.LOG_LEVEL,
  };
}

/**
 * `abcdefgh...wxyz`; the last four characters only appear for keys longer than 12
 */
export function maskApiKey(key: string): string {
  return `${key.slice(0, 8)}...${key.length > 12 ? key.slice(-4) : ''}`;
}

export function describeConfig(config: ProbeConfig): string[] {
  return [
    `API URL: ${config.apiUrl}`,
    `API Key: ${config.apiKey ? `Set (${maskApiKey(config.apiKey)})` : 'Not set'}`,
    `Region: ${config.region}`,
    `Service: ${config.service}`,
    `Timeout: ${config.timeoutMs}ms`,
  ];
}
