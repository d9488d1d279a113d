/**
 * Environment configuration. Every value has a default except the provider
 * keys, which only `update-results` needs.
 */

import { ConfigError } from './errors.ts';
import type { RetryPolicy } from './results/provider-fetch.ts';

const KEY_NAMES = ['API_SPORTS_KEY', 'API_SPORTS_KEY_BACKUP_1', 'API_SPORTS_KEY_BACKUP_2'];

export interface SupabaseConfig {
  url: string;
  serviceKey: string;
}

export interface AppConfig {
  picksFile: string;
  apiKeys: string[];
  timezone: string;
  retry: RetryPolicy;
  concurrency: number;
  supabase: SupabaseConfig | null;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readTimezone(env: Env): string {
  const timezone = env.RESULTS_TIMEZONE?.trim() || 'UTC';
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone: timezone });
  } catch {
    throw new ConfigError(`RESULTS_TIMEZONE "${timezone}" is not a valid IANA timezone`);
  }
  return timezone;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const apiKeys: string[] = [];
  for (const name of KEY_NAMES) {
    const val = env[name]?.trim();
    if (val) apiKeys.push(val);
  }

  const supabaseUrl = env.SUPABASE_URL?.trim();
  const supabaseKey = env.SUPABASE_SERVICE_ROLE_KEY?.trim();

  return {
    picksFile: env.PICKS_FILE?.trim() || 'my_picks.json',
    apiKeys,
    timezone: readTimezone(env),
    retry: {
      retries: readInt(env, 'LOOKUP_RETRIES', 3, 0),
      baseDelayMs: readInt(env, 'LOOKUP_BACKOFF_MS', 500, 0),
      timeoutMs: readInt(env, 'LOOKUP_TIMEOUT_MS', 10_000, 1),
    },
    concurrency: readInt(env, 'LOOKUP_CONCURRENCY', 4, 1),
    supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, serviceKey: supabaseKey } : null,
  };
}
