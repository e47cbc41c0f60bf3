import { tmpdir } from 'os';
import { join } from 'path';
import type { Db } from '../db/index.js';
import { CONFIG_KEYS, type Config } from '../models/config.js';

// Map config keys to environment variable names
const ENV_KEY_MAP: Record<string, string> = {
  [CONFIG_KEYS.LLM_API_KEY]: 'LLM_API_KEY',
  [CONFIG_KEYS.LLM_BASE_URL]: 'LLM_BASE_URL',
  [CONFIG_KEYS.LLM_MODEL]: 'LLM_MODEL',
  [CONFIG_KEYS.RAINDROP_TOKEN]: 'RAINDROP_TOKEN',
  [CONFIG_KEYS.PROXY_URL]: 'PROXY_URL',
  [CONFIG_KEYS.RETENTION_DAYS]: 'RSS_TRIAGE_RETENTION_DAYS',
  [CONFIG_KEYS.REFRESH_CONCURRENCY]: 'RSS_TRIAGE_REFRESH_CONCURRENCY',
  [CONFIG_KEYS.LOG_FILE]: 'RSS_TRIAGE_LOG',
};

// Default values for config keys
const DEFAULT_VALUES: Record<string, string> = {
  [CONFIG_KEYS.LLM_BASE_URL]: 'https://api.openai.com/v1',
  [CONFIG_KEYS.LLM_MODEL]: 'gpt-4o-mini',
  [CONFIG_KEYS.RETENTION_DAYS]: '30',
  [CONFIG_KEYS.REFRESH_CONCURRENCY]: '5',
  [CONFIG_KEYS.LOG_FILE]: join(tmpdir(), 'rss-triage.log'),
};

export class ConfigService {
  constructor(
    private readonly db: Db,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  get(key: string): string | null {
    // Priority: env > db > default
    const envKey = ENV_KEY_MAP[key];
    const fromEnv = envKey ? this.env[envKey] : undefined;
    if (fromEnv) {
      return fromEnv;
    }

    const row = this.db
      .prepare<[string], Config>('SELECT key, value FROM config WHERE key = ?')
      .get(key);
    if (row?.value) {
      return row.value;
    }

    return DEFAULT_VALUES[key] ?? null;
  }

  /** Positive integer setting; anything unparseable falls back to `fallback`. */
  getNumber(key: string, fallback: number): number {
    const value = Number.parseInt(this.get(key) ?? '', 10);
    return Number.isFinite(value) && value > 0 ? value : fallback;
  }

  set(key: string, value: string): void {
    this.db.prepare(
      'INSERT INTO config (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
    ).run(key, value);
  }

  delete(key: string): boolean {
    const result = this.db.prepare('DELETE FROM config WHERE key = ?').run(key);
    return result.changes > 0;
  }

  all(): Config[] {
    return this.db.prepare<[], Config>('SELECT key, value FROM config ORDER BY key').all();
  }
}
