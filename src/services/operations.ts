import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { errorMessage } from '../utils/errors.js';
import { truncateUtf8, type Summarizer } from './llm.js';
import type { Logger } from '../utils/logger.js';
import type { CacheService } from './cache.js';
import type { FeedDiscoverer } from './discovery.js';
import type { FeedInfo, RssService } from './rss.js';
import type { Article, Summary } from '../models/article.js';
import type { Feed } from '../models/feed.js';

export type OperationClass = 'refresh' | 'summarize' | 'discover';

export type OperationState<T> =
  | { status: 'idle' }
  | { status: 'running' }
  | { status: 'completed'; result: T }
  | { status: 'failed'; error: string };

export type OperationOutcome<T> = Extract<OperationState<T>, { status: 'completed' | 'failed' }>;

/**
 * One background operation at a time: idle → running → completed | failed.
 *
 * `start` while running is rejected (returns false) and the running instance
 * carries on. `poll` never waits; it hands a finished outcome to the caller
 * once and resets the slot to idle. A finished outcome nobody polled is
 * dropped by the next `start`.
 */
export class OperationSlot<T> {
  private state: OperationState<T> = { status: 'idle' };
  private current: Promise<void> = Promise.resolve();

  constructor(
    readonly name: string,
    private readonly logger: Logger,
  ) {}

  get isRunning(): boolean {
    return this.state.status === 'running';
  }

  start(task: () => Promise<T>): boolean {
    if (this.state.status === 'running') {
      this.logger.debug(`[Ops] ${this.name} already running; start rejected`);
      return false;
    }

    this.state = { status: 'running' };
    this.current = Promise.resolve()
      .then(task)
      .then(
        (result) => {
          this.state = { status: 'completed', result };
        },
        (error: unknown) => {
          const message = errorMessage(error);
          this.logger.error(`[Ops] ${this.name} failed: ${message}`);
          this.state = { status: 'failed', error: message };
        }
      );
    return true;
  }

  poll(): OperationOutcome<T> | null {
    const state = this.state;
    if (state.status === 'completed' || state.status === 'failed') {
      this.state = { status: 'idle' };
      return state;
    }
    return null;
  }

  /** Resolves once the current run has finished. Never rejects. */
  settled(): Promise<void> {
    return this.current;
  }
}

export interface RefreshReport {
  feeds: number;
  succeeded: number;
  failed: number;
  inserted: number;
  updated: number;
  suppressed: number;
}

export interface SummaryResult {
  article_id: number;
  summary: Summary;
}

export interface DiscoveryResult {
  site_url: string;
  discovered: FeedInfo[];
  /** The first discovered feed that was not subscribed yet. */
  added: Feed | null;
}

export interface OperationResults {
  refresh: RefreshReport;
  summarize: SummaryResult;
  discover: DiscoveryResult;
}

type OperationSlots = { [K in OperationClass]: OperationSlot<OperationResults[K]> };

export interface OperationDeps {
  cache: CacheService;
  rss: Pick<RssService, 'fetchAll'>;
  summarizer: Summarizer;
  discovery: FeedDiscoverer;
  logger: Logger;
}

export class BackgroundOperations {
  private readonly slots: OperationSlots;

  constructor(private readonly deps: OperationDeps) {
    this.slots = {
      refresh: new OperationSlot('refresh', deps.logger),
      summarize: new OperationSlot('summarize', deps.logger),
      discover: new OperationSlot('discover', deps.logger),
    };
  }

  /**
   * Fetches all feeds, upserts every candidate and stamps last_fetched on the
   * feeds that answered. Per-feed failures only lower `succeeded`.
   */
  startRefresh(feeds: Feed[]): boolean {
    const { cache, rss, logger } = this.deps;

    return this.slots.refresh.start(async () => {
      const results = await rss.fetchAll(feeds);
      const report: RefreshReport = {
        feeds: feeds.length,
        succeeded: results.length,
        failed: feeds.length - results.length,
        inserted: 0,
        updated: 0,
        suppressed: 0,
      };

      for (const { feed_id, articles } of results) {
        // The user may have removed the feed while it was being fetched
        if (!cache.getFeedById(feed_id)) continue;

        const counts = cache.upsertArticles(articles);
        report.inserted += counts.inserted;
        report.updated += counts.updated;
        report.suppressed += counts.suppressed;
        cache.updateFeedFetchTime(feed_id);

        // Let the render loop run between feeds
        await yieldToEventLoop();
      }

      logger.info(
        `[Ops] Refreshed ${report.succeeded}/${report.feeds} feeds: +${report.inserted} new, ${report.updated} updated`
      );
      return report;
    });
  }

  /** Summarizes the article and stores the result. Nothing is written on failure. */
  startSummarize(article: Article): boolean {
    const { cache, summarizer } = this.deps;

    return this.slots.summarize.start(async () => {
      const content = truncateUtf8(article.content_text ?? article.content ?? '');
      const text = await summarizer.generateSummary(article.title, content);

      if (!cache.getArticleById(article.id)) {
        throw new Error(`"${article.title}" was deleted before its summary arrived`);
      }
      cache.saveSummary(article.id, text, summarizer.modelVersion);

      const summary = cache.getSummary(article.id);
      if (!summary) {
        throw new Error(`Summary for "${article.title}" was not stored`);
      }
      return { article_id: article.id, summary };
    });
  }

  /** Probes a site for feeds and subscribes to the first new one. */
  startDiscover(siteUrl: string): boolean {
    const { cache, discovery } = this.deps;

    return this.slots.discover.start(async () => {
      const discovered = await discovery.discover(siteUrl);
      if (discovered.length === 0) {
        throw new Error(`No feed found at ${siteUrl}`);
      }

      let added: Feed | null = null;
      for (const info of discovered) {
        if (cache.getFeedByUrl(info.url)) continue;
        added = cache.addFeed({
          title: info.title,
          url: info.url,
          site_url: info.site_url,
          description: info.description,
        });
        break;
      }
      return { site_url: siteUrl, discovered, added };
    });
  }

  poll<K extends OperationClass>(kind: K): OperationOutcome<OperationResults[K]> | null {
    return this.slots[kind].poll();
  }

  isRunning(kind: OperationClass): boolean {
    return this.slots[kind].isRunning;
  }

  settled(kind: OperationClass): Promise<void> {
    return this.slots[kind].settled();
  }
}
