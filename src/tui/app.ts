import { homedir } from 'os';
import { join } from 'path';
import { OperationSlot } from '../services/operations.js';
import { exportOpmlFile, importOpmlFile } from '../services/opml.js';
import { errorMessage } from '../utils/errors.js';
import { mailtoUrl, type Opener } from '../utils/open.js';
import { isTextEntry, NORMAL_MODE, type AppAction, type InputMode, type TextEntryMode } from './keys.js';
import type { AppContext } from '../context.js';
import type { Article, ArticleKey } from '../models/article.js';
import type { Feed } from '../models/feed.js';
import type { ScreenView, StatusMessage } from './render.js';

export const STATUS_TTL_MS = 3000;

export interface BookmarkOutcome {
  article_id: number;
  bookmark_id: number;
  tags: string[];
}

export type AppDeps = Pick<AppContext, 'cache' | 'operations' | 'bookmarks' | 'logger' | 'retentionDays'>;

export interface AppOptions {
  opener: Opener;
  now?: () => number;
}

export function expandHome(path: string): string {
  return path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
}

/** Splits on commas and whitespace, keeping first-seen order. */
export function parseTags(input: string): string[] {
  const tags: string[] = [];
  for (const part of input.split(/[,\s]+/)) {
    if (part && !tags.includes(part)) tags.push(part);
  }
  return tags;
}

/**
 * Shell state and input handling. Never awaits: long work goes through the
 * operation slots and `tick` picks up the outcomes.
 */
export class App {
  private articles: Article[] = [];
  private selected = 0;
  private mode: InputMode = NORMAL_MODE;
  private showHelp = false;
  private status: StatusMessage | null = null;
  private summarizingId: number | null = null;
  private spinnerFrame = 0;
  private deleted: ArticleKey[] = [];
  private readonly bookmarkSlot: OperationSlot<BookmarkOutcome>;
  private readonly now: () => number;

  constructor(
    private readonly deps: AppDeps,
    private readonly options: AppOptions,
  ) {
    this.bookmarkSlot = new OperationSlot('bookmark', deps.logger);
    this.now = options.now ?? Date.now;
  }

  get inputMode(): InputMode {
    return this.mode;
  }

  get helpVisible(): boolean {
    return this.showHelp;
  }

  /** Prunes old articles, loads the list and kicks off a refresh. */
  start(): void {
    const { cache, logger, retentionDays } = this.deps;
    const pruned = cache.deleteOldArticles(retentionDays);
    if (pruned > 0) {
      logger.info(`[DB] Pruned ${pruned} articles older than ${retentionDays} days`);
    }
    this.reload();

    const feeds = cache.getAllFeeds();
    if (feeds.length > 0) {
      this.startRefresh(feeds);
    }
  }

  current(): Article | null {
    return this.articles[this.selected] ?? null;
  }

  view(): ScreenView {
    const { cache, operations } = this.deps;
    const article = this.current();
    return {
      articles: this.articles,
      selected: this.selected,
      summary: article ? cache.getSummary(article.id) : null,
      bookmark: article ? cache.getBookmark(article.id) : null,
      mode: this.mode,
      showHelp: this.showHelp,
      status: this.status,
      summarizingId: this.summarizingId,
      busy: {
        refresh: operations.isRunning('refresh'),
        summarize: operations.isRunning('summarize'),
        discover: operations.isRunning('discover'),
        bookmark: this.bookmarkSlot.isRunning,
      },
      spinnerFrame: this.spinnerFrame,
    };
  }

  /** Returns true when the shell should exit. */
  handleAction(action: AppAction): boolean {
    switch (action.type) {
      case 'quit':
        return true;
      case 'move-up':
        this.select(this.selected - 1);
        break;
      case 'move-down':
        this.select(this.selected + 1);
        break;
      case 'move-top':
        this.select(0);
        break;
      case 'move-bottom':
        this.select(this.articles.length - 1);
        break;
      case 'select':
        this.summarizeSelected(false);
        break;
      case 'regenerate':
        this.summarizeSelected(true);
        break;
      case 'refresh':
        this.startRefresh(this.deps.cache.getAllFeeds());
        break;
      case 'open':
        this.openSelected();
        break;
      case 'email':
        this.emailSelected();
        break;
      case 'bookmark':
        if (this.canBookmark()) this.mode = { kind: 'tag-entry', buffer: '' };
        break;
      case 'bookmark-prefix':
        if (this.canBookmark()) this.mode = { kind: 'bookmark-prefix' };
        break;
      case 'quick-bookmark':
        this.mode = NORMAL_MODE;
        this.startBookmark([action.tag]);
        break;
      case 'cancel-prefix':
        this.mode = NORMAL_MODE;
        break;
      case 'delete-article':
        this.deleteSelected();
        break;
      case 'delete-feed':
        this.deleteSelectedFeed();
        break;
      case 'undelete':
        this.undelete();
        break;
      case 'add-feed':
        this.mode = { kind: 'feed-entry', buffer: '' };
        break;
      case 'import-opml':
        this.mode = { kind: 'opml-import', buffer: '' };
        break;
      case 'export-opml':
        this.mode = { kind: 'opml-export', buffer: '' };
        break;
      case 'show-help':
        this.showHelp = true;
        break;
      case 'hide-help':
        this.showHelp = false;
        break;
      case 'input-char':
        if (isTextEntry(this.mode)) this.mode = { ...this.mode, buffer: this.mode.buffer + action.char };
        break;
      case 'input-backspace':
        if (isTextEntry(this.mode)) this.mode = { ...this.mode, buffer: this.mode.buffer.slice(0, -1) };
        break;
      case 'input-cancel':
        this.mode = NORMAL_MODE;
        break;
      case 'input-confirm':
        if (isTextEntry(this.mode)) {
          const entry = this.mode;
          this.mode = NORMAL_MODE;
          this.confirmEntry(entry);
        }
        break;
    }
    return false;
  }

  /** Polls every operation slot and expires the status line. Called once per frame. */
  tick(): void {
    const { operations } = this.deps;
    this.spinnerFrame++;

    const refresh = operations.poll('refresh');
    if (refresh?.status === 'completed') {
      const report = refresh.result;
      this.reload();
      const failed = report.failed > 0 ? `, ${report.failed} failed` : '';
      this.info(`Refreshed ${report.succeeded}/${report.feeds} feeds: ${report.inserted} new${failed}`);
    } else if (refresh?.status === 'failed') {
      this.error(`Refresh failed: ${refresh.error}`);
    }

    const summary = operations.poll('summarize');
    if (summary) {
      this.summarizingId = null;
      if (summary.status === 'completed') {
        this.info('Summary ready');
      } else {
        this.error(`Summary failed: ${summary.error}`);
      }
    }

    const discovery = operations.poll('discover');
    if (discovery?.status === 'completed') {
      const { added, site_url } = discovery.result;
      if (added) {
        this.afterFeedsAdded([added], `Added feed: ${added.title}`);
      } else {
        this.info(`Already subscribed to every feed at ${site_url}`);
      }
    } else if (discovery?.status === 'failed') {
      this.error(`Add feed failed: ${discovery.error}`);
    }

    const bookmark = this.bookmarkSlot.poll();
    if (bookmark?.status === 'completed') {
      const tags = bookmark.result.tags;
      this.info(tags.length > 0 ? `Bookmarked [${tags.join(', ')}]` : 'Bookmarked');
    } else if (bookmark?.status === 'failed') {
      this.error(`Bookmark failed: ${bookmark.error}`);
    }

    if (this.status && this.now() >= this.status.expiresAt) {
      this.status = null;
    }
  }

  private reload(): void {
    const selectedId = this.current()?.id;
    this.articles = this.deps.cache.getAllArticlesSorted();
    const index = this.articles.findIndex((article) => article.id === selectedId);
    this.select(index >= 0 ? index : this.selected);
  }

  private select(index: number): void {
    this.selected = Math.max(0, Math.min(index, this.articles.length - 1));
  }

  private info(text: string): void {
    this.status = { text, level: 'info', expiresAt: this.now() + STATUS_TTL_MS };
  }

  private error(text: string): void {
    this.status = { text, level: 'error', expiresAt: this.now() + STATUS_TTL_MS };
  }

  private startRefresh(feeds: Feed[]): void {
    if (feeds.length === 0) {
      this.info('No feeds yet: press a to add one or i to import OPML');
      return;
    }
    if (this.deps.operations.startRefresh(feeds)) {
      this.info(`Refreshing ${feeds.length} feed${feeds.length === 1 ? '' : 's'}...`);
    } else {
      this.info('Refresh already in progress');
    }
  }

  private summarizeSelected(force: boolean): void {
    const article = this.current();
    if (!article) return;

    if (!force && this.deps.cache.getSummary(article.id)) {
      this.info('Summary already stored (g to regenerate)');
      return;
    }
    if (this.deps.operations.startSummarize(article)) {
      this.summarizingId = article.id;
      this.info(`Summarizing "${article.title}"...`);
    } else {
      this.info('Summary already in progress');
    }
  }

  private openSelected(): void {
    const article = this.current();
    if (!article) return;
    if (!article.url) {
      this.error('Article has no link');
      return;
    }
    this.options.opener(article.url);
  }

  private emailSelected(): void {
    const article = this.current();
    if (!article) return;
    if (!article.url) {
      this.error('Article has no link');
      return;
    }
    this.options.opener(mailtoUrl(article.title, article.url));
  }

  private canBookmark(): boolean {
    const article = this.current();
    if (!article) return false;
    if (!article.url) {
      this.error('Article has no link');
      return false;
    }
    if (this.deps.cache.isBookmarked(article.id)) {
      this.info('Already bookmarked');
      return false;
    }
    return true;
  }

  private startBookmark(tags: string[]): void {
    const { cache, bookmarks } = this.deps;
    const article = this.current();
    if (!article) return;

    const excerpt = cache.getSummary(article.id)?.content ?? null;
    const started = this.bookmarkSlot.start(async () => {
      const bookmarkId = await bookmarks.saveBookmark({
        url: article.url,
        title: article.title,
        excerpt,
        tags,
      });
      cache.markBookmarked(article.id, bookmarkId, tags);
      return { article_id: article.id, bookmark_id: bookmarkId, tags };
    });
    this.info(started ? 'Saving bookmark...' : 'Bookmark already in progress');
  }

  private deleteSelected(): void {
    const article = this.current();
    if (!article) return;

    try {
      const key = this.deps.cache.deleteArticle(article.id);
      if (key) {
        this.deleted.push(key);
      }
    } catch (error) {
      this.error(`Delete failed: ${errorMessage(error)}`);
      return;
    }
    this.reload();
    this.info(`Deleted "${article.title}" (u to undo)`);
  }

  private deleteSelectedFeed(): void {
    const article = this.current();
    if (!article) return;

    try {
      this.deps.cache.removeFeed(article.feed_id);
    } catch (error) {
      this.error(`Remove feed failed: ${errorMessage(error)}`);
      return;
    }
    this.deleted = this.deleted.filter((key) => key.feed_id !== article.feed_id);
    this.reload();
    this.info(`Removed feed "${article.feed_title}"`);
  }

  private undelete(): void {
    const { cache, operations } = this.deps;
    let key: ArticleKey | null;
    let restored: boolean;
    try {
      key = this.deleted.at(-1) ?? cache.getLatestTombstone();
      restored = key !== null && cache.undeleteArticle(key.feed_id, key.guid);
    } catch (error) {
      // The undo stack keeps its entry for another try
      this.error(`Undelete failed: ${errorMessage(error)}`);
      return;
    }
    this.deleted.pop();
    if (!key || !restored) {
      this.info('Nothing to undelete');
      return;
    }

    // The row itself is gone; the next fetch of its feed brings it back
    const feed = cache.getFeedById(key.feed_id);
    if (feed && operations.startRefresh([feed])) {
      this.info(`Restored; re-fetching ${feed.title}...`);
    } else {
      this.info('Restored; it returns on the next refresh');
    }
  }

  private afterFeedsAdded(feeds: Feed[], message: string): void {
    if (feeds.length > 0 && this.deps.operations.startRefresh(feeds)) {
      this.info(`${message}; fetching...`);
    } else {
      this.info(message);
    }
  }

  private confirmEntry(entry: TextEntryMode): void {
    const value = entry.buffer.trim();

    switch (entry.kind) {
      case 'tag-entry':
        this.startBookmark(parseTags(value));
        return;
      case 'feed-entry':
        if (!value) return;
        if (this.deps.operations.startDiscover(value)) {
          this.info(`Looking for feeds at ${value}...`);
        } else {
          this.info('Feed discovery already in progress');
        }
        return;
      case 'opml-import':
        if (!value) return;
        try {
          const { added, skipped } = importOpmlFile(this.deps.cache, expandHome(value));
          this.afterFeedsAdded(added, `Imported ${added.length} feeds (${skipped} already subscribed)`);
        } catch (error) {
          this.error(`Import failed: ${errorMessage(error)}`);
        }
        return;
      case 'opml-export':
        if (!value) return;
        try {
          const count = exportOpmlFile(this.deps.cache, expandHome(value));
          this.info(`Exported ${count} feeds to ${value}`);
        } catch (error) {
          this.error(`Export failed: ${errorMessage(error)}`);
        }
        return;
    }
  }
}
