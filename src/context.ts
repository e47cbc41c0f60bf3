import { closeDb, DB_PATH, openDb, type Db } from './db/index.js';
import { CONFIG_KEYS } from './models/config.js';
import { BookmarkService, type BookmarkClient } from './services/bookmark.js';
import { CacheService } from './services/cache.js';
import { DiscoveryService } from './services/discovery.js';
import { HttpClient } from './services/http.js';
import { LlmService, type Summarizer } from './services/llm.js';
import { BackgroundOperations } from './services/operations.js';
import { DEFAULT_REFRESH_CONCURRENCY, RssService } from './services/rss.js';
import { ConfigService } from './utils/config.js';
import { Logger } from './utils/logger.js';

export const DEFAULT_RETENTION_DAYS = 30;

export interface AppContext {
  db: Db;
  config: ConfigService;
  logger: Logger;
  cache: CacheService;
  http: HttpClient;
  rss: RssService;
  summarizer: Summarizer;
  bookmarks: BookmarkClient;
  discovery: DiscoveryService;
  operations: BackgroundOperations;
  retentionDays: number;
}

export interface AppContextOptions {
  dbPath?: string;
  /** The shell owns the terminal, so log to the file only. */
  interactive?: boolean;
  debug?: boolean;
  env?: NodeJS.ProcessEnv;
}

export function resolveDbPath(option: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  return option || env.RSS_TRIAGE_DB || DB_PATH;
}

/** Opens the store and wires every service once. Throws when the store cannot be opened. */
export function openAppContext(options: AppContextOptions = {}): AppContext {
  const env = options.env ?? process.env;
  const db = openDb(resolveDbPath(options.dbPath, env));
  const config = new ConfigService(db, env);

  const logger = new Logger({
    debug: options.debug,
    console: !options.interactive,
    file: options.interactive ? config.get(CONFIG_KEYS.LOG_FILE) : null,
  });

  const cache = new CacheService(db);
  const http = new HttpClient({ proxyUrl: config.get(CONFIG_KEYS.PROXY_URL) });
  const rss = new RssService({
    fetcher: http,
    logger,
    concurrency: config.getNumber(CONFIG_KEYS.REFRESH_CONCURRENCY, DEFAULT_REFRESH_CONCURRENCY),
  });
  const summarizer = new LlmService(http, config, logger);
  const bookmarks = new BookmarkService(http, config, logger);
  const discovery = new DiscoveryService(http, rss, logger);
  const operations = new BackgroundOperations({ cache, rss, summarizer, discovery, logger });

  return {
    db,
    config,
    logger,
    cache,
    http,
    rss,
    summarizer,
    bookmarks,
    discovery,
    operations,
    retentionDays: config.getNumber(CONFIG_KEYS.RETENTION_DAYS, DEFAULT_RETENTION_DAYS),
  };
}

export function closeAppContext(context: AppContext): void {
  closeDb(context.db);
}

/** Opens the context on first use; commands that never touch the store never open it. */
export type ContextProvider = () => AppContext;
