import { JSDOM, VirtualConsole } from 'jsdom';
import type { Logger } from '../utils/logger.js';
import type { TextFetcher } from './http.js';
import type { FeedInfo, RssService } from './rss.js';

const FEED_LINK_TYPES = new Set([
  'application/rss+xml',
  'application/atom+xml',
  'application/xml',
  'text/xml',
]);

// Tried in order when a page advertises no feed
export const COMMON_FEED_PATHS = ['/feed', '/rss', '/feed.xml', '/rss.xml', '/atom.xml', '/index.xml'];

export function normalizeSiteUrl(input: string): string {
  const trimmed = input.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  return new URL(withScheme).href;
}

/** `<link rel="alternate">` feed URLs of an HTML page, resolved and de-duplicated. */
export function extractFeedLinks(html: string, pageUrl: string): string[] {
  // jsdom reports CSS and script noise through its console; ignore it
  const virtualConsole = new VirtualConsole();
  const dom = new JSDOM(html, { url: pageUrl, virtualConsole });
  const links = dom.window.document.querySelectorAll('link[rel~="alternate"][href]');

  const found: string[] = [];
  for (const link of Array.from(links)) {
    const type = (link.getAttribute('type') ?? '').toLowerCase().split(';')[0].trim();
    const href = link.getAttribute('href');
    if (!href || !FEED_LINK_TYPES.has(type) || !URL.canParse(href, pageUrl)) continue;

    const resolved = new URL(href, pageUrl).href;
    if (!found.includes(resolved)) found.push(resolved);
  }
  dom.window.close();
  return found;
}

export interface FeedDiscoverer {
  discover(siteUrl: string): Promise<FeedInfo[]>;
}

export class DiscoveryService implements FeedDiscoverer {
  constructor(
    private readonly fetcher: TextFetcher,
    private readonly rss: RssService,
    private readonly logger: Logger,
  ) {}

  /**
   * Finds feeds for a site: the URL itself when it is a feed, else the
   * feeds its page advertises, else the first common feed path that answers.
   * Fetch errors for the site page propagate.
   */
  async discover(siteUrl: string): Promise<FeedInfo[]> {
    const url = normalizeSiteUrl(siteUrl);
    const body = await this.fetcher.fetchText(url);

    const direct = await this.rss.parseFeedInfo(url, body);
    if (direct) {
      return [direct];
    }

    const advertised = extractFeedLinks(body, url);
    this.logger.debug(`[Discovery] ${url} advertises ${advertised.length} feed(s)`);

    const found: FeedInfo[] = [];
    if (advertised.length > 0) {
      for (const candidate of advertised) {
        const info = await this.rss.detectFeedInfo(candidate);
        if (info) found.push(info);
      }
      return found;
    }

    for (const path of COMMON_FEED_PATHS) {
      const info = await this.rss.detectFeedInfo(new URL(path, url).href);
      if (info) {
        found.push(info);
        break;
      }
    }
    return found;
  }
}
