import { ConfigError } from './errors.js';
import {
  DEFAULT_INSTANCE_URL,
  DEFAULT_LIMIT,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
} from './mastodon-client-constants.js';

export type OutputMode = 'json' | 'text';

/** Settings for one invocation. Built once, then passed explicitly. */
export interface RequestConfig {
  instanceUrl: string;
  limit: number;
  timeoutSeconds: number;
  mode: OutputMode;
}

export type RequestConfigOptions = {
  instance?: string;
  limit?: string | number;
  timeout?: string | number;
  json?: boolean;
};

const POSITIVE_INTEGER_REGEX = /^\d+$/;

function parsePositiveInteger(value: string | number, label: string): number {
  const text = String(value).trim();
  const parsed = POSITIVE_INTEGER_REGEX.test(text) ? Number(text) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid ${label}. Expected a positive integer.`);
  }
  return parsed;
}

function parseTimeoutSeconds(value: string | number, label: string): number {
  const parsed = parsePositiveInteger(value, label);
  if (parsed > MAX_TIMEOUT_SECONDS) {
    throw new ConfigError(`Invalid ${label}. Expected at most ${MAX_TIMEOUT_SECONDS} seconds.`);
  }
  return parsed;
}

function pick(env: Record<string, string | undefined>, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function resolveInstanceUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(`Invalid instance URL: ${value}`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigError(`Invalid instance URL: ${value}`);
  }
  return value.replace(/\/+$/, '');
}

/**
 * Options win over environment variables, which win over defaults.
 * Throws ConfigError on values that cannot be used.
 */
export function resolveRequestConfig(
  opts: RequestConfigOptions,
  env: Record<string, string | undefined> = process.env,
): RequestConfig {
  const instance = opts.instance ?? pick(env, 'MASTODON_INSTANCE') ?? DEFAULT_INSTANCE_URL;

  let limit = DEFAULT_LIMIT;
  if (opts.limit !== undefined) {
    limit = parsePositiveInteger(opts.limit, '--limit');
  } else {
    const fromEnv = pick(env, 'MASTODON_SCOUT_LIMIT');
    if (fromEnv) {
      limit = parsePositiveInteger(fromEnv, 'MASTODON_SCOUT_LIMIT');
    }
  }

  let timeoutSeconds = DEFAULT_TIMEOUT_SECONDS;
  if (opts.timeout !== undefined) {
    timeoutSeconds = parseTimeoutSeconds(opts.timeout, '--timeout');
  } else {
    const fromEnv = pick(env, 'MASTODON_SCOUT_TIMEOUT');
    if (fromEnv) {
      timeoutSeconds = parseTimeoutSeconds(fromEnv, 'MASTODON_SCOUT_TIMEOUT');
    }
  }

  return {
    instanceUrl: resolveInstanceUrl(instance),
    limit,
    timeoutSeconds,
    mode: opts.json ? 'json' : 'text',
  };
}
