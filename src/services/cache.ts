import type { Db } from '../db/index.js';
import type { Feed, FeedInput } from '../models/feed.js';
import type {
  Article,
  ArticleInput,
  ArticleKey,
  Bookmark,
  Summary,
  Tombstone,
  UpsertCounts,
  UpsertResult,
} from '../models/article.js';

interface FeedRow {
  id: number;
  title: string;
  url: string;
  site_url: string | null;
  description: string | null;
  last_fetched: string | null;
  created_at: string | null;
  updated_at: string | null;
}

interface ArticleRow {
  id: number;
  feed_id: number;
  guid: string;
  title: string;
  url: string;
  author: string | null;
  content: string | null;
  content_text: string | null;
  published_at: string | null;
  fetched_at: string | null;
  feed_title: string;
}

interface SummaryRow {
  id: number;
  article_id: number;
  content: string;
  model_version: string;
  generated_at: string | null;
}

interface BookmarkRow {
  article_id: number;
  bookmark_id: number;
  tags: string;
  saved_at: string | null;
}

interface TombstoneRow {
  feed_id: number;
  guid: string;
  deleted_at: string | null;
}

type ArticleParams = [
  number, string, string, string, string | null, string | null, string | null, string | null,
];

const SQLITE_DATETIME = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/;

/**
 * Parses the two timestamp shapes the store holds: RFC 3339 written by us and
 * `YYYY-MM-DD HH:MM:SS` (UTC) written by SQLite defaults. Returns null for
 * anything else.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const normalized = SQLITE_DATETIME.test(value) ? `${value.replace(' ', 'T')}Z` : value;
  const time = Date.parse(normalized);
  return Number.isNaN(time) ? null : new Date(time);
}

// A corrupt required timestamp must not make a whole listing fail
function timestampOrNow(value: string | null | undefined): Date {
  return parseTimestamp(value) ?? new Date();
}

function parseTags(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : [];
  } catch {
    return raw ? raw.split(',').map(t => t.trim()).filter(Boolean) : [];
  }
}

function toFeed(row: FeedRow): Feed {
  return {
    id: row.id,
    title: row.title,
    url: row.url,
    site_url: row.site_url,
    description: row.description,
    last_fetched: parseTimestamp(row.last_fetched),
    created_at: timestampOrNow(row.created_at),
    updated_at: timestampOrNow(row.updated_at),
  };
}

function toArticle(row: ArticleRow): Article {
  return {
    ...row,
    published_at: parseTimestamp(row.published_at),
    fetched_at: timestampOrNow(row.fetched_at),
  };
}

function toSummary(row: SummaryRow): Summary {
  return { ...row, generated_at: timestampOrNow(row.generated_at) };
}

// Selects articles past the retention window: published_at when it is usable, else fetched_at
const AGED_ARTICLE_IDS = `
  SELECT id FROM articles
  WHERE COALESCE(julianday(published_at), julianday(fetched_at)) < julianday('now', ?)
`;

const ARTICLE_COLUMNS = `
  a.id, a.feed_id, a.guid, a.title, a.url, a.author, a.content, a.content_text,
  a.published_at, a.fetched_at, f.title as feed_title
`;

function daysModifier(days: number): string {
  return `-${days} days`;
}

export class CacheService {
  constructor(private readonly db: Db) {}

  // Feed operations
  addFeed(input: FeedInput): Feed {
    const result = this.db.prepare(`
      INSERT INTO feeds (title, url, site_url, description)
      VALUES (?, ?, ?, ?)
    `).run(input.title, input.url, input.site_url ?? null, input.description ?? null);

    const feed = this.getFeedById(Number(result.lastInsertRowid));
    if (!feed) {
      throw new Error(`Feed ${input.url} vanished after insert`);
    }
    return feed;
  }

  getFeedById(id: number): Feed | null {
    const row = this.db.prepare<[number], FeedRow>('SELECT * FROM feeds WHERE id = ?').get(id);
    return row ? toFeed(row) : null;
  }

  getFeedByUrl(url: string): Feed | null {
    const row = this.db.prepare<[string], FeedRow>('SELECT * FROM feeds WHERE url = ?').get(url);
    return row ? toFeed(row) : null;
  }

  getAllFeeds(): Feed[] {
    return this.db
      .prepare<[], FeedRow>('SELECT * FROM feeds ORDER BY title COLLATE NOCASE, id')
      .all()
      .map(toFeed);
  }

  updateFeedFetchTime(feedId: number): void {
    this.db.prepare(
      `UPDATE feeds SET last_fetched = datetime('now'), updated_at = datetime('now') WHERE id = ?`
    ).run(feedId);
  }

  /** Removes a feed with its articles, their dependents and its tombstones. */
  removeFeed(feedId: number): boolean {
    const remove = this.db.transaction((id: number): boolean => {
      this.db.prepare(
        'DELETE FROM summaries WHERE article_id IN (SELECT id FROM articles WHERE feed_id = ?)'
      ).run(id);
      this.db.prepare(
        'DELETE FROM bookmarks WHERE article_id IN (SELECT id FROM articles WHERE feed_id = ?)'
      ).run(id);
      this.db.prepare('DELETE FROM articles WHERE feed_id = ?').run(id);
      this.db.prepare('DELETE FROM deleted_articles WHERE feed_id = ?').run(id);
      return this.db.prepare('DELETE FROM feeds WHERE id = ?').run(id).changes > 0;
    });
    return remove(feedId);
  }

  // Article operations
  isTombstoned(feedId: number, guid: string): boolean {
    const row = this.db
      .prepare<[number, string], { found: number }>(
        'SELECT 1 as found FROM deleted_articles WHERE feed_id = ? AND guid = ?'
      )
      .get(feedId, guid);
    return row !== undefined;
  }

  /**
   * Inserts or updates the article keyed by (feed_id, guid). A tombstoned key
   * is left alone and reported as suppressed. fetched_at keeps the value from
   * the first insert.
   */
  upsertArticle(input: ArticleInput): UpsertResult {
    const upsert = this.db.transaction((article: ArticleInput): UpsertResult => {
      if (this.isTombstoned(article.feed_id, article.guid)) {
        return { status: 'suppressed' };
      }

      const existing = this.db
        .prepare<[number, string], { id: number }>(
          'SELECT id FROM articles WHERE feed_id = ? AND guid = ?'
        )
        .get(article.feed_id, article.guid);

      const row = this.db.prepare<ArticleParams, { id: number }>(`
        INSERT INTO articles (feed_id, guid, title, url, author, content, content_text, published_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(feed_id, guid) DO UPDATE SET
          title = excluded.title,
          url = excluded.url,
          author = excluded.author,
          content = excluded.content,
          content_text = excluded.content_text,
          published_at = excluded.published_at
        RETURNING id
      `).get(
        article.feed_id,
        article.guid,
        article.title,
        article.url,
        article.author ?? null,
        article.content ?? null,
        article.content_text ?? null,
        article.published_at ? article.published_at.toISOString() : null,
      );
      if (!row) {
        throw new Error(`Upsert of ${article.guid} returned no row`);
      }

      return existing ? { status: 'updated', id: row.id } : { status: 'inserted', id: row.id };
    });

    return upsert(input);
  }

  upsertArticles(inputs: ArticleInput[]): UpsertCounts {
    const upsertMany = this.db.transaction((articles: ArticleInput[]): UpsertCounts => {
      const counts: UpsertCounts = { inserted: 0, updated: 0, suppressed: 0 };
      for (const article of articles) {
        counts[this.upsertArticle(article).status]++;
      }
      return counts;
    });

    return upsertMany(inputs);
  }

  getArticleById(id: number): Article | null {
    const row = this.db
      .prepare<[number], ArticleRow>(`
        SELECT ${ARTICLE_COLUMNS}
        FROM articles a
        JOIN feeds f ON a.feed_id = f.id
        WHERE a.id = ?
      `)
      .get(id);
    return row ? toArticle(row) : null;
  }

  /** Every article, newest first by published_at, falling back to fetched_at. */
  getAllArticlesSorted(): Article[] {
    return this.db
      .prepare<[], ArticleRow>(`
        SELECT ${ARTICLE_COLUMNS}
        FROM articles a
        JOIN feeds f ON a.feed_id = f.id
        ORDER BY COALESCE(julianday(a.published_at), julianday(a.fetched_at)) DESC, a.id DESC
      `)
      .all()
      .map(toArticle);
  }

  /**
   * Tombstones the article, drops its summary and bookmark record, then the
   * row itself. Each step is a no-op when already done, so an interrupted
   * delete is finished by calling this again. Returns the tombstoned key, or
   * null when the article no longer exists.
   */
  deleteArticle(id: number): ArticleKey | null {
    const key = this.db
      .prepare<[number], ArticleKey>('SELECT feed_id, guid FROM articles WHERE id = ?')
      .get(id);

    this.db.prepare(`
      INSERT OR IGNORE INTO deleted_articles (feed_id, guid)
      SELECT feed_id, guid FROM articles WHERE id = ?
    `).run(id);
    this.db.prepare('DELETE FROM summaries WHERE article_id = ?').run(id);
    this.db.prepare('DELETE FROM bookmarks WHERE article_id = ?').run(id);
    this.db.prepare('DELETE FROM articles WHERE id = ?').run(id);

    return key ?? null;
  }

  undeleteArticle(feedId: number, guid: string): boolean {
    const result = this.db
      .prepare('DELETE FROM deleted_articles WHERE feed_id = ? AND guid = ?')
      .run(feedId, guid);
    return result.changes > 0;
  }

  getLatestTombstone(): Tombstone | null {
    const row = this.db
      .prepare<[], TombstoneRow>(`
        SELECT feed_id, guid, deleted_at FROM deleted_articles
        ORDER BY deleted_at DESC, rowid DESC
        LIMIT 1
      `)
      .get();
    return row ? { ...row, deleted_at: timestampOrNow(row.deleted_at) } : null;
  }

  /** Deletes articles older than `days` (dependents first). Returns the article count. */
  deleteOldArticles(days: number): number {
    const prune = this.db.transaction((modifier: string): number => {
      this.db.prepare(`DELETE FROM summaries WHERE article_id IN (${AGED_ARTICLE_IDS})`).run(modifier);
      this.db.prepare(`DELETE FROM bookmarks WHERE article_id IN (${AGED_ARTICLE_IDS})`).run(modifier);
      return this.db.prepare(`DELETE FROM articles WHERE id IN (${AGED_ARTICLE_IDS})`).run(modifier).changes;
    });

    return prune(daysModifier(days));
  }

  /**
   * Retention plus tombstone pruning and VACUUM. Pruned tombstones make very
   * old entries ingestible again if a source still serves them.
   */
  compactDatabase(days: number): number {
    const deleted = this.deleteOldArticles(days);
    this.db
      .prepare(`DELETE FROM deleted_articles WHERE julianday(deleted_at) < julianday('now', ?)`)
      .run(daysModifier(days));
    this.db.exec('VACUUM');
    return deleted;
  }

  // Summary operations
  getSummary(articleId: number): Summary | null {
    const row = this.db
      .prepare<[number], SummaryRow>(
        'SELECT id, article_id, content, model_version, generated_at FROM summaries WHERE article_id = ?'
      )
      .get(articleId);
    return row ? toSummary(row) : null;
  }

  /** Replaces the article's summary. Throws when the article no longer exists. */
  saveSummary(articleId: number, content: string, modelVersion: string): void {
    this.db.prepare(`
      INSERT INTO summaries (article_id, content, model_version)
      VALUES (?, ?, ?)
      ON CONFLICT(article_id) DO UPDATE SET
        content = excluded.content,
        model_version = excluded.model_version,
        generated_at = datetime('now')
    `).run(articleId, content, modelVersion);
  }

  // Bookmark tracking
  markBookmarked(articleId: number, bookmarkId: number, tags: string[]): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO bookmarks (article_id, bookmark_id, tags)
      VALUES (?, ?, ?)
    `).run(articleId, bookmarkId, JSON.stringify(tags));
  }

  getBookmark(articleId: number): Bookmark | null {
    const row = this.db
      .prepare<[number], BookmarkRow>(
        'SELECT article_id, bookmark_id, tags, saved_at FROM bookmarks WHERE article_id = ?'
      )
      .get(articleId);
    if (!row) return null;
    return {
      article_id: row.article_id,
      bookmark_id: row.bookmark_id,
      tags: parseTags(row.tags),
      saved_at: timestampOrNow(row.saved_at),
    };
  }

  isBookmarked(articleId: number): boolean {
    return this.getBookmark(articleId) !== null;
  }
}
