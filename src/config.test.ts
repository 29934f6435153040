import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig } from './config';

describe('loadConfig', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  test('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      statcastBaseUrl: 'https://baseballsavant.mlb.com/statcast_search/csv',
      mlbStatsApiBaseUrl: 'https://statsapi.mlb.com/api/v1',
      httpTimeoutMs: 60_000,
      httpMaxAttempts: 3,
      statcastChunkDays: 3,
      chadwickRegisterPath: null,
    });
    expect(warnSpy).not.toHaveBeenCalled();
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      STATCAST_BASE_URL: 'http://localhost:8080/csv',
      MLB_STATS_API_BASE_URL: 'http://localhost:8081/api/v1//',
      HTTP_TIMEOUT_MS: '5000',
      HTTP_MAX_ATTEMPTS: '1',
      STATCAST_CHUNK_DAYS: '7',
      CHADWICK_REGISTER_PATH: ' data/people.csv ',
    });

    expect(config).toEqual({
      statcastBaseUrl: 'http://localhost:8080/csv',
      mlbStatsApiBaseUrl: 'http://localhost:8081/api/v1',
      httpTimeoutMs: 5000,
      httpMaxAttempts: 1,
      statcastChunkDays: 7,
      chadwickRegisterPath: 'data/people.csv',
    });
  });

  test.each(['0', '-2', '2.5', 'soon'])('warns and falls back when STATCAST_CHUNK_DAYS=%s', (raw) => {
    const config = loadConfig({ STATCAST_CHUNK_DAYS: raw });

    expect(config.statcastChunkDays).toBe(3);
    expect(warnSpy).toHaveBeenCalledWith(
      `⚠️  Ignoring STATCAST_CHUNK_DAYS=${raw} (expected a positive integer), using 3`
    );
  });

  test('treats blank values as unset', () => {
    const config = loadConfig({ HTTP_TIMEOUT_MS: '  ', STATCAST_BASE_URL: '', CHADWICK_REGISTER_PATH: ' ' });

    expect(config.httpTimeoutMs).toBe(60_000);
    expect(config.statcastBaseUrl).toBe('https://baseballsavant.mlb.com/statcast_search/csv');
    expect(config.chadwickRegisterPath).toBeNull();
    expect(warnSpy).not.toHaveBeenCalled();
  });
});

describe('.env loading', () => {
  const keys = ['DOTENV_CONFIG_PATH', 'STATCAST_BASE_URL', 'HTTP_TIMEOUT_MS'] as const;
  const saved = new Map<string, string | undefined>();
  let dir: string;

  beforeEach(() => {
    for (const key of keys) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pitch-similarity-env-'));
    const envFile = path.join(dir, '.env');
    fs.writeFileSync(envFile, 'STATCAST_BASE_URL=http://savant.local/csv\nHTTP_TIMEOUT_MS=1234\n');
    process.env.DOTENV_CONFIG_PATH = envFile;
  });

  afterEach(() => {
    for (const key of keys) {
      const value = saved.get(key);
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('applies .env before any service reads the config', async () => {
    await jest.isolateModulesAsync(async () => {
      // Services built at import time are the first to pull in the config
      const { statcastService } = await import('./services/StatcastService');
      const { config } = await import('./config');

      const url = new URL(statcastService.buildUrl({ startDate: '2024-04-01', endDate: '2024-04-01' }));
      expect(url.origin + url.pathname).toBe('http://savant.local/csv');
      expect(config.httpTimeoutMs).toBe(1234);
    });
  });
});
