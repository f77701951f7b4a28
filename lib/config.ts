// Centralized runtime configuration for the archive query, retries and DNS checks.
// Defaults are overridden by env, then by an optional JSON config file, then by CLI flags.
// Core modules never read this directly; the CLI passes plain values down.

import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import type { BackoffStrategy } from './net/fetchWithRetry';

export const OUTPUT_FORMATS = ['txt', 'json', 'csv'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface AppConfig {
  apiUrl: string;
  outputFormats: OutputFormat[];
  collapse: string;
  maxResults: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  backoff: BackoffStrategy;
  userAgent: string;
  dnsTimeoutMs: number;
  dnsConcurrency: number;
}

export const DEFAULT_CONFIG_FILE = 'wayback-subdomains.json';

export const DEFAULTS: AppConfig = {
  apiUrl: 'https://web.archive.org/cdx/search/cdx',
  outputFormats: ['txt'],
  collapse: 'urlkey',
  maxResults: 10000,
  timeoutMs: 30_000,
  maxRetries: 3,
  retryDelayMs: 1000,
  backoff: 'exponential',
  userAgent: 'wayback-subdomains/1.0',
  dnsTimeoutMs: 3000,
  dnsConcurrency: 10,
};

function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const v = env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    ...DEFAULTS,
    apiUrl: env.WAYBACK_API_URL || DEFAULTS.apiUrl,
    timeoutMs: envInt(env, 'WAYBACK_TIMEOUT_MS', DEFAULTS.timeoutMs),
    maxRetries: envInt(env, 'WAYBACK_MAX_RETRIES', DEFAULTS.maxRetries),
    retryDelayMs: envInt(env, 'WAYBACK_RETRY_DELAY_MS', DEFAULTS.retryDelayMs),
    maxResults: envInt(env, 'WAYBACK_MAX_RESULTS', DEFAULTS.maxResults),
    dnsTimeoutMs: envInt(env, 'DNS_TIMEOUT_MS', DEFAULTS.dnsTimeoutMs),
    dnsConcurrency: envInt(env, 'DNS_CONCURRENCY', DEFAULTS.dnsConcurrency),
  };
}

const positiveInt = z.number().int().positive();

export const configFileSchema = z
  .object({
    apiUrl: z.string().url(),
    outputFormats: z.array(z.enum(OUTPUT_FORMATS)).nonempty(),
    collapse: z.string().min(1),
    maxResults: positiveInt,
    timeoutMs: positiveInt,
    maxRetries: positiveInt,
    retryDelayMs: z.number().int().nonnegative(),
    backoff: z.enum(['fixed', 'exponential']),
    userAgent: z.string().min(1),
    dnsTimeoutMs: positiveInt,
    dnsConcurrency: positiveInt,
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Read and validate a JSON config file.
 * Returns `null` when the file does not exist and `optional` is set.
 */
export async function readConfigFile(path: string, optional = false): Promise<ConfigFile | null> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf-8');
  } catch (err) {
    if (optional && isNotFound(err)) return null;
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = configFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${path}: ${issues}`);
  }
  return parsed.data;
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/** Defaults < env < config file. CLI flags are applied on top by the caller. */
export async function loadConfig(opts: {
  file?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<AppConfig> {
  const base = configFromEnv(opts.env);
  const fromFile = await readConfigFile(opts.file ?? DEFAULT_CONFIG_FILE, opts.file === undefined);
  return fromFile ? { ...base, ...fromFile } : base;
}
