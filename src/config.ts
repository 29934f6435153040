import 'dotenv/config';

export interface AppConfig {
  statcastBaseUrl: string;
  mlbStatsApiBaseUrl: string;
  httpTimeoutMs: number;
  httpMaxAttempts: number;
  /** Days per Savant request; one request returns at most 25,000 rows */
  statcastChunkDays: number;
  chadwickRegisterPath: string | null;
}

const DEFAULTS: AppConfig = {
  statcastBaseUrl: 'https://baseballsavant.mlb.com/statcast_search/csv',
  mlbStatsApiBaseUrl: 'https://statsapi.mlb.com/api/v1',
  httpTimeoutMs: 60_000,
  httpMaxAttempts: 3,
  statcastChunkDays: 3,
  chadwickRegisterPath: null,
};

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    console.warn(`⚠️  Ignoring ${key}=${raw} (expected a positive integer), using ${fallback}`);
    return fallback;
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    statcastBaseUrl: readString(env, 'STATCAST_BASE_URL', DEFAULTS.statcastBaseUrl),
    mlbStatsApiBaseUrl: readString(env, 'MLB_STATS_API_BASE_URL', DEFAULTS.mlbStatsApiBaseUrl).replace(/\/+$/, ''),
    httpTimeoutMs: readPositiveInt(env, 'HTTP_TIMEOUT_MS', DEFAULTS.httpTimeoutMs),
    httpMaxAttempts: readPositiveInt(env, 'HTTP_MAX_ATTEMPTS', DEFAULTS.httpMaxAttempts),
    statcastChunkDays: readPositiveInt(env, 'STATCAST_CHUNK_DAYS', DEFAULTS.statcastChunkDays),
    chadwickRegisterPath: env.CHADWICK_REGISTER_PATH?.trim() || DEFAULTS.chadwickRegisterPath,
  };
}

export const config: AppConfig = loadConfig();
