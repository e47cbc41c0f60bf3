import Parser from 'rss-parser';
import PQueue from 'p-queue';
import { createHash } from 'crypto';
import { convert } from 'html-to-text';
import { FeedParseError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { TextFetcher } from './http.js';
import type { ArticleInput } from '../models/article.js';
import type { Feed } from '../models/feed.js';

export const DEFAULT_REFRESH_CONCURRENCY = 5;

interface FeedExtras {
  subtitle?: string;
}

interface ItemExtras {
  contentEncoded?: string;
  author?: string;
  id?: string;
  updated?: string;
}

type ParsedItem = ItemExtras & Parser.Item;

export interface FeedInfo {
  url: string;
  title: string;
  site_url: string | null;
  description: string | null;
}

export interface FeedFetchResult {
  feed_id: number;
  articles: ArticleInput[];
}

export interface RssServiceOptions {
  fetcher: TextFetcher;
  logger: Logger;
  concurrency?: number;
}

export function htmlToPlainText(html: string): string {
  if (!html) return '';
  return convert(html, {
    wordwrap: false,
    selectors: [
      { selector: 'a', options: { ignoreHref: true } },
      { selector: 'img', format: 'skip' },
    ],
  }).trim();
}

/** rss-parser yields an object for an element with attributes and no text. */
function textOf(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Stable identity for an entry. Entries without a guid/id get a key derived
 * from link and title (content when both are empty) so that re-fetching the
 * same entry maps onto the same row.
 */
export function entryGuid(item: ParsedItem): string {
  const native = textOf(item.guid) || textOf(item.id);
  if (native) return native;

  const link = textOf(item.link);
  const title = textOf(item.title);
  const basis = link || title
    ? `${link}\n${title}`
    : textOf(item.contentEncoded) || textOf(item.content) || textOf(item.summary);
  return `derived:${createHash('sha256').update(basis).digest('hex').slice(0, 32)}`;
}

function parseDate(value: unknown): Date | null {
  const text = textOf(value);
  if (!text) return null;
  const time = Date.parse(text);
  return Number.isNaN(time) ? null : new Date(time);
}

export class RssService {
  private parser: Parser<FeedExtras, ItemExtras>;
  private fetcher: TextFetcher;
  private logger: Logger;
  private concurrency: number;

  constructor(options: RssServiceOptions) {
    this.fetcher = options.fetcher;
    this.logger = options.logger;
    this.concurrency = options.concurrency ?? DEFAULT_REFRESH_CONCURRENCY;
    this.parser = new Parser<FeedExtras, ItemExtras>({
      customFields: {
        feed: ['subtitle'],
        item: [
          ['content:encoded', 'contentEncoded'],
          ['dc:creator', 'creator'],
          'updated',
        ],
      },
    });
  }

  /** Turns one feed document into candidate articles. Throws FeedParseError. */
  async parseArticles(feedId: number, url: string, xml: string): Promise<ArticleInput[]> {
    const parsed = await this.parser.parseString(xml).catch((error: unknown) => {
      throw new FeedParseError(url, error);
    });

    return parsed.items.map((item) => this.toArticleInput(feedId, item));
  }

  private toArticleInput(feedId: number, item: ParsedItem): ArticleInput {
    // Structured content first, then the summary/description
    const content = textOf(item.contentEncoded) || textOf(item.content) || textOf(item.summary) || null;

    let contentText: string | null = null;
    if (content) {
      try {
        contentText = htmlToPlainText(content) || null;
      } catch (error) {
        this.logger.debug(`[RSS] Plain-text conversion failed for ${textOf(item.link) || feedId}: ${errorMessage(error)}`);
      }
    }

    return {
      feed_id: feedId,
      guid: entryGuid(item),
      title: textOf(item.title) || 'Untitled',
      url: textOf(item.link),
      author: textOf(item.creator) || textOf(item.author) || null,
      content,
      content_text: contentText,
      published_at: parseDate(item.isoDate) ?? parseDate(item.pubDate) ?? parseDate(item.updated),
    };
  }

  async fetchFeed(feed: Feed): Promise<ArticleInput[]> {
    const xml = await this.fetcher.fetchText(feed.url);
    return this.parseArticles(feed.id, feed.url, xml);
  }

  /**
   * Fetches every feed with at most `concurrency` requests in flight. Failed
   * feeds are logged and left out; the call itself does not fail for them.
   * Results arrive in completion order.
   */
  async fetchAll(feeds: Feed[]): Promise<FeedFetchResult[]> {
    const queue = new PQueue({ concurrency: this.concurrency });
    const results: FeedFetchResult[] = [];

    await Promise.all(
      feeds.map((feed) =>
        queue.add(async () => {
          try {
            const articles = await this.fetchFeed(feed);
            this.logger.debug(`[RSS] Fetched ${articles.length} articles from ${feed.title}`);
            results.push({ feed_id: feed.id, articles });
          } catch (error) {
            this.logger.warn(`[RSS] ${feed.title}: ${errorMessage(error)}`);
          }
        })
      )
    );

    return results;
  }

  async parseFeedInfo(url: string, xml: string): Promise<FeedInfo | null> {
    try {
      const parsed = await this.parser.parseString(xml);
      return {
        url,
        title: textOf(parsed.title) || url,
        site_url: textOf(parsed.link) || null,
        description: textOf(parsed.description) || textOf(parsed.subtitle) || null,
      };
    } catch (error) {
      this.logger.debug(`[RSS] ${url} is not a feed: ${errorMessage(error)}`);
      return null;
    }
  }

  async detectFeedInfo(url: string): Promise<FeedInfo | null> {
    let xml: string;
    try {
      xml = await this.fetcher.fetchText(url);
    } catch (error) {
      this.logger.debug(`[RSS] Probe of ${url} failed: ${errorMessage(error)}`);
      return null;
    }
    return this.parseFeedInfo(url, xml);
  }
}
