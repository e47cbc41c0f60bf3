import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { closeDb, openDb, type Db } from '../../db/index.js';
import { CacheService } from '../../services/cache.js';
import { BackgroundOperations } from '../../services/operations.js';
import { Logger } from '../../utils/logger.js';
import { App, STATUS_TTL_MS, expandHome, parseTags } from '../app.js';
import type { BookmarkRequest } from '../../services/bookmark.js';
import type { FeedInfo, FeedFetchResult } from '../../services/rss.js';
import type { Feed } from '../../models/feed.js';
import type { AppAction } from '../keys.js';

const HOUR = 3_600_000;

/** Lets queued promise chains finish. */
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('parseTags', () => {
  it('splits on commas and spaces and drops repeats', () => {
    expect(parseTags(' news, ai  news,,tools ')).toEqual(['news', 'ai', 'tools']);
  });

  it('returns nothing for blank input', () => {
    expect(parseTags('   ')).toEqual([]);
  });
});

describe('expandHome', () => {
  it('leaves other paths alone', () => {
    expect(expandHome('/tmp/feeds.opml')).toBe('/tmp/feeds.opml');
    expect(expandHome('feeds~/x.opml')).toBe('feeds~/x.opml');
  });

  it('expands a leading tilde', () => {
    expect(expandHome('~/feeds.opml').endsWith('/feeds.opml')).toBe(true);
    expect(expandHome('~/feeds.opml').startsWith('~')).toBe(false);
  });
});

describe('App', () => {
  let db: Db;
  let cache: CacheService;
  let feed: Feed;
  let clock: number;
  let logger: Logger;
  let operations: BackgroundOperations;

  const fetchAll = vi.fn(async (feeds: Feed[]): Promise<FeedFetchResult[]> =>
    feeds.map((f) => ({ feed_id: f.id, articles: [] }))
  );
  const generateSummary = vi.fn(async (_title: string, _content: string): Promise<string> => 'Short summary');
  const discover = vi.fn(async (_site: string): Promise<FeedInfo[]> => []);
  const saveBookmark = vi.fn(async (_request: BookmarkRequest): Promise<number> => 501);
  const opener = vi.fn((_target: string) => {});

  function addArticle(guid: string, title: string, hoursAgo: number): void {
    cache.upsertArticle({
      feed_id: feed.id,
      guid,
      title,
      url: `https://a.example/posts/${guid}`,
      content_text: `${title} body`,
      published_at: new Date(Date.now() - hoursAgo * HOUR),
    });
  }

  function createApp(): App {
    return new App(
      { cache, operations, bookmarks: { saveBookmark }, logger, retentionDays: 30 },
      { opener, now: () => clock }
    );
  }

  /** A started app whose initial refresh has been picked up. */
  async function startedApp(): Promise<App> {
    const app = createApp();
    app.start();
    await operations.settled('refresh');
    app.tick();
    return app;
  }

  function run(app: App, ...actions: AppAction[]): void {
    for (const action of actions) app.handleAction(action);
  }

  function type(app: App, text: string): void {
    for (const char of text) app.handleAction({ type: 'input-char', char });
  }

  function statusText(app: App): string | undefined {
    return app.view().status?.text;
  }

  beforeEach(() => {
    vi.clearAllMocks();
    db = openDb(':memory:');
    cache = new CacheService(db);
    clock = 1_000_000;
    logger = new Logger({ console: false });
    operations = new BackgroundOperations({
      cache,
      rss: { fetchAll },
      summarizer: { modelVersion: 'fake-1', generateSummary },
      discovery: { discover },
      logger,
    });
    feed = cache.addFeed({ title: 'Feed A', url: 'https://a.example/feed' });
    addArticle('newest', 'Newest post', 1);
    addArticle('middle', 'Middle post', 2);
    addArticle('oldest', 'Oldest post', 3);
  });

  afterEach(() => {
    closeDb(db);
  });

  describe('start', () => {
    it('loads the list and refreshes every feed', async () => {
      const app = createApp();
      app.start();

      expect(app.view().articles.map((a) => a.guid)).toEqual(['newest', 'middle', 'oldest']);
      expect(statusText(app)).toBe('Refreshing 1 feed...');

      await operations.settled('refresh');
      app.tick();
      expect(fetchAll).toHaveBeenCalledWith([expect.objectContaining({ id: feed.id })]);
      expect(statusText(app)).toBe('Refreshed 1/1 feeds: 0 new');
    });

    it('prunes articles past the retention window', async () => {
      addArticle('ancient', 'Ancient post', 40 * 24);
      const info = vi.spyOn(logger, 'info');

      const app = createApp();
      app.start();
      await operations.settled('refresh');

      expect(info).toHaveBeenCalledWith('[DB] Pruned 1 articles older than 30 days');
      expect(app.view().articles).toHaveLength(3);
    });

    it('asks for a feed when there are none', () => {
      cache.removeFeed(feed.id);
      const app = createApp();
      app.start();

      expect(fetchAll).not.toHaveBeenCalled();
      expect(statusText(app)).toBe('No feeds yet: press a to add one or i to import OPML');
    });
  });

  it('keeps the selection within the list', async () => {
    const app = await startedApp();

    run(app, { type: 'move-up' });
    expect(app.current()?.guid).toBe('newest');
    run(app, { type: 'move-down' }, { type: 'move-down' }, { type: 'move-down' });
    expect(app.current()?.guid).toBe('oldest');
    run(app, { type: 'move-top' });
    expect(app.view().selected).toBe(0);
    run(app, { type: 'move-bottom' });
    expect(app.view().selected).toBe(2);
  });

  it('reloads after a refresh and keeps the selected article', async () => {
    const app = await startedApp();
    run(app, { type: 'move-down' });
    fetchAll.mockImplementationOnce(async (feeds) => [
      {
        feed_id: feeds[0].id,
        articles: [
          { feed_id: feeds[0].id, guid: 'fresh', title: 'Fresh post', url: 'https://a.example/posts/fresh', published_at: new Date() },
        ],
      },
    ]);

    run(app, { type: 'refresh' });
    expect(statusText(app)).toBe('Refreshing 1 feed...');
    run(app, { type: 'refresh' });
    expect(statusText(app)).toBe('Refresh already in progress');

    await operations.settled('refresh');
    app.tick();

    expect(app.view().articles.map((a) => a.guid)).toEqual(['fresh', 'newest', 'middle', 'oldest']);
    expect(app.current()?.guid).toBe('middle');
    expect(statusText(app)).toBe('Refreshed 1/1 feeds: 1 new');
  });

  it('reports a refresh where a feed failed', async () => {
    const app = await startedApp();
    fetchAll.mockImplementationOnce(async () => []);

    run(app, { type: 'refresh' });
    await operations.settled('refresh');
    app.tick();

    expect(statusText(app)).toBe('Refreshed 0/1 feeds: 0 new, 1 failed');
  });

  describe('summaries', () => {
    it('summarizes the selected article once and shows the result', async () => {
      const app = await startedApp();

      run(app, { type: 'select' });
      expect(statusText(app)).toBe('Summarizing "Newest post"...');
      expect(app.view().summarizingId).toBe(app.current()?.id);

      await operations.settled('summarize');
      app.tick();

      expect(generateSummary).toHaveBeenCalledWith('Newest post', 'Newest post body');

      expect(statusText(app)).toBe('Summary ready');
      expect(app.view().summarizingId).toBeNull();
      expect(app.view().summary?.content).toBe('Short summary');

      run(app, { type: 'select' });
      expect(statusText(app)).toBe('Summary already stored (g to regenerate)');
      expect(generateSummary).toHaveBeenCalledTimes(1);
    });

    it('regenerates on request', async () => {
      const app = await startedApp();
      const current = app.current();
      if (!current) throw new Error('no article selected');
      cache.saveSummary(current.id, 'Old summary', 'fake-0');

      run(app, { type: 'regenerate' });
      await operations.settled('summarize');
      app.tick();

      expect(cache.getSummary(current.id)).toMatchObject({ content: 'Short summary', model_version: 'fake-1' });
    });

    it('shows a failure as an error status', async () => {
      generateSummary.mockRejectedValueOnce(new Error('Summarizer API error: overloaded'));
      const app = await startedApp();

      run(app, { type: 'select' });
      await operations.settled('summarize');
      app.tick();

      expect(app.view().status).toMatchObject({ text: 'Summary failed: Summarizer API error: overloaded', level: 'error' });
    });
  });

  describe('delete and undelete', () => {
    it('deletes the selected article and restores it on u', async () => {
      const app = await startedApp();

      run(app, { type: 'delete-article' });
      expect(statusText(app)).toBe('Deleted "Newest post" (u to undo)');
      expect(app.view().articles.map((a) => a.guid)).toEqual(['middle', 'oldest']);
      expect(app.current()?.guid).toBe('middle');
      expect(cache.isTombstoned(feed.id, 'newest')).toBe(true);

      run(app, { type: 'undelete' });
      expect(cache.isTombstoned(feed.id, 'newest')).toBe(false);
      expect(statusText(app)).toBe('Restored; re-fetching Feed A...');
      await operations.settled('refresh');
      expect(fetchAll).toHaveBeenLastCalledWith([expect.objectContaining({ id: feed.id })]);
    });

    it('falls back to the newest stored tombstone', async () => {
      const app = await startedApp();
      const oldest = app.view().articles[2];
      cache.deleteArticle(oldest.id);

      run(app, { type: 'undelete' });

      expect(cache.isTombstoned(feed.id, 'oldest')).toBe(false);
    });

    it('says so when there is nothing to restore', async () => {
      const app = await startedApp();
      run(app, { type: 'undelete' });
      expect(statusText(app)).toBe('Nothing to undelete');
    });

    it('removes the selected article\'s feed with its tombstones', async () => {
      const app = await startedApp();
      run(app, { type: 'delete-article' });

      run(app, { type: 'delete-feed' });
      expect(statusText(app)).toBe('Removed feed "Feed A"');
      expect(app.view().articles).toEqual([]);
      expect(app.current()).toBeNull();

      run(app, { type: 'undelete' });
      expect(statusText(app)).toBe('Nothing to undelete');
    });
  });

  describe('store failures', () => {
    const locked = () => {
      throw new Error('database is locked');
    };

    it('reports a failed delete and keeps the list', async () => {
      const app = await startedApp();
      vi.spyOn(cache, 'deleteArticle').mockImplementation(locked);
      vi.spyOn(cache, 'removeFeed').mockImplementation(locked);

      run(app, { type: 'delete-article' });
      expect(app.view().status).toMatchObject({ text: 'Delete failed: database is locked', level: 'error' });
      expect(app.view().articles).toHaveLength(3);

      run(app, { type: 'delete-feed' });
      expect(statusText(app)).toBe('Remove feed failed: database is locked');
      expect(app.current()?.guid).toBe('newest');
    });

    it('keeps the undo entry when undelete fails', async () => {
      const app = await startedApp();
      run(app, { type: 'delete-article' });
      const undelete = vi.spyOn(cache, 'undeleteArticle').mockImplementationOnce(locked);

      run(app, { type: 'undelete' });
      expect(app.view().status).toMatchObject({ text: 'Undelete failed: database is locked', level: 'error' });
      expect(cache.isTombstoned(feed.id, 'newest')).toBe(true);

      run(app, { type: 'undelete' });
      expect(undelete).toHaveBeenLastCalledWith(feed.id, 'newest');
      expect(cache.isTombstoned(feed.id, 'newest')).toBe(false);
      await operations.settled('refresh');
    });
  });

  describe('bookmarks', () => {
    it('bookmarks with the typed tags', async () => {
      const app = await startedApp();

      run(app, { type: 'bookmark' });
      expect(app.inputMode).toEqual({ kind: 'tag-entry', buffer: '' });
      type(app, 'news, ai newsx');
      run(app, { type: 'input-backspace' });
      expect(app.inputMode).toEqual({ kind: 'tag-entry', buffer: 'news, ai news' });

      run(app, { type: 'input-confirm' });
      expect(app.inputMode).toEqual({ kind: 'normal' });
      expect(statusText(app)).toBe('Saving bookmark...');
      expect(app.view().busy.bookmark).toBe(true);

      await flush();
      app.tick();

      expect(saveBookmark).toHaveBeenCalledWith({
        url: 'https://a.example/posts/newest',
        title: 'Newest post',
        excerpt: null,
        tags: ['news', 'ai'],
      });
      expect(statusText(app)).toBe('Bookmarked [news, ai]');
      expect(app.view().bookmark).toMatchObject({ bookmark_id: 501, tags: ['news', 'ai'] });

      run(app, { type: 'bookmark' });
      expect(app.inputMode).toEqual({ kind: 'normal' });
      expect(statusText(app)).toBe('Already bookmarked');
    });

    it('quick-bookmarks with the stored summary as excerpt', async () => {
      const app = await startedApp();
      const current = app.current();
      if (!current) throw new Error('no article selected');
      cache.saveSummary(current.id, 'Stored summary', 'fake-1');

      run(app, { type: 'bookmark-prefix' });
      expect(app.inputMode).toEqual({ kind: 'bookmark-prefix' });
      run(app, { type: 'quick-bookmark', tag: 'twit' });
      expect(app.inputMode).toEqual({ kind: 'normal' });

      await flush();
      app.tick();

      expect(saveBookmark).toHaveBeenCalledWith(
        expect.objectContaining({ excerpt: 'Stored summary', tags: ['twit'] })
      );
      expect(statusText(app)).toBe('Bookmarked [twit]');
    });

    it('cancels the prefix without bookmarking', async () => {
      const app = await startedApp();
      run(app, { type: 'bookmark-prefix' }, { type: 'cancel-prefix' });

      expect(app.inputMode).toEqual({ kind: 'normal' });
      expect(saveBookmark).not.toHaveBeenCalled();
    });

    it('leaves the article unmarked when the service fails', async () => {
      saveBookmark.mockRejectedValueOnce(new Error('Raindrop API error: bad token'));
      const app = await startedApp();

      run(app, { type: 'bookmark' }, { type: 'input-confirm' });
      await flush();
      app.tick();

      expect(app.view().status).toMatchObject({ text: 'Bookmark failed: Raindrop API error: bad token', level: 'error' });
      expect(cache.isBookmarked(app.view().articles[0].id)).toBe(false);
    });
  });

  it('opens and emails the selected link', async () => {
    const app = await startedApp();

    run(app, { type: 'open' });
    expect(opener).toHaveBeenLastCalledWith('https://a.example/posts/newest');

    run(app, { type: 'email' });
    expect(opener).toHaveBeenLastCalledWith(
      'mailto:?subject=Newest%20post&body=https%3A%2F%2Fa.example%2Fposts%2Fnewest'
    );
  });

  it('expires the status line', async () => {
    const app = await startedApp();
    expect(statusText(app)).toBe('Refreshed 1/1 feeds: 0 new');

    clock += STATUS_TTL_MS - 1;
    app.tick();
    expect(statusText(app)).toBe('Refreshed 1/1 feeds: 0 new');

    clock += 1;
    app.tick();
    expect(app.view().status).toBeNull();
  });

  it('toggles the help overlay', async () => {
    const app = await startedApp();
    run(app, { type: 'show-help' });
    expect(app.helpVisible).toBe(true);
    run(app, { type: 'hide-help' });
    expect(app.helpVisible).toBe(false);
  });

  it('quits only on quit', async () => {
    const app = await startedApp();
    expect(app.handleAction({ type: 'move-down' })).toBe(false);
    expect(app.handleAction({ type: 'quit' })).toBe(true);
  });

  describe('adding feeds', () => {
    it('discovers a feed and fetches it', async () => {
      discover.mockResolvedValueOnce([
        { url: 'https://example.org/feed', title: 'Example Org', site_url: null, description: null },
      ]);
      const app = await startedApp();

      run(app, { type: 'add-feed' });
      type(app, ' example.org ');
      run(app, { type: 'input-confirm' });
      expect(statusText(app)).toBe('Looking for feeds at example.org...');

      await operations.settled('discover');
      app.tick();
      expect(discover).toHaveBeenCalledWith('example.org');
      expect(statusText(app)).toBe('Added feed: Example Org; fetching...');
      expect(cache.getFeedByUrl('https://example.org/feed')?.title).toBe('Example Org');

      await operations.settled('refresh');
      app.tick();
      expect(statusText(app)).toBe('Refreshed 1/1 feeds: 0 new');
    });

    it('reports a site without feeds', async () => {
      const app = await startedApp();

      run(app, { type: 'add-feed' });
      type(app, 'empty.example');
      run(app, { type: 'input-confirm' });
      await operations.settled('discover');
      app.tick();

      expect(app.view().status).toMatchObject({ text: 'Add feed failed: No feed found at empty.example', level: 'error' });
    });

    it('does nothing when the entry is cancelled or blank', async () => {
      const app = await startedApp();

      run(app, { type: 'add-feed' });
      type(app, 'example.org');
      run(app, { type: 'input-cancel' });
      run(app, { type: 'add-feed' }, { type: 'input-confirm' });

      expect(app.inputMode).toEqual({ kind: 'normal' });
      expect(discover).not.toHaveBeenCalled();
    });
  });

  describe('OPML', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'app-opml-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('imports feeds from a file and fetches the new ones', async () => {
      const path = join(dir, 'subs.opml');
      writeFileSync(
        path,
        `<opml version="2.0"><body>
          <outline type="rss" text="Feed A" xmlUrl="https://a.example/feed"/>
          <outline type="rss" text="Feed B" xmlUrl="https://b.example/feed"/>
        </body></opml>`
      );
      const app = await startedApp();

      run(app, { type: 'import-opml' });
      type(app, path);
      run(app, { type: 'input-confirm' });

      expect(statusText(app)).toBe('Imported 1 feeds (1 already subscribed); fetching...');
      await operations.settled('refresh');
      expect(fetchAll).toHaveBeenLastCalledWith([expect.objectContaining({ url: 'https://b.example/feed' })]);
    });

    it('reports an unreadable file as an error', async () => {
      const app = await startedApp();

      run(app, { type: 'import-opml' });
      type(app, join(dir, 'missing.opml'));
      run(app, { type: 'input-confirm' });

      expect(app.view().status?.level).toBe('error');
      expect(statusText(app)).toMatch(/^Import failed: /);
    });

    it('exports every feed', async () => {
      const path = join(dir, 'out.opml');
      const app = await startedApp();

      run(app, { type: 'export-opml' });
      type(app, path);
      run(app, { type: 'input-confirm' });

      expect(statusText(app)).toBe(`Exported 1 feeds to ${path}`);
    });
  });
});
