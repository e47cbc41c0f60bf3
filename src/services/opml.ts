import { readFileSync, writeFileSync } from 'fs';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { Feed, FeedInput } from '../models/feed.js';
import type { CacheService } from './cache.js';

interface OutlineNode {
  '@_text'?: string;
  '@_title'?: string;
  '@_xmlUrl'?: string;
  '@_htmlUrl'?: string;
  '@_description'?: string;
  outline?: OutlineNode[];
}

const outlineSchema: z.ZodType<OutlineNode> = z.lazy(() =>
  z.object({
    '@_text': z.string().optional(),
    '@_title': z.string().optional(),
    '@_xmlUrl': z.string().optional(),
    '@_htmlUrl': z.string().optional(),
    '@_description': z.string().optional(),
    outline: z.array(outlineSchema).optional(),
  })
);

const opmlSchema = z.object({
  opml: z.object({
    body: z.object({ outline: z.array(outlineSchema).optional() }).or(z.literal('')).optional(),
  }),
});

export interface OpmlImportResult {
  added: Feed[];
  skipped: number;
}

function collectFeeds(outlines: OutlineNode[], feeds: FeedInput[]): void {
  for (const outline of outlines) {
    // An outline with xmlUrl is a feed; anything else is a folder
    const xmlUrl = outline['@_xmlUrl']?.trim();
    if (xmlUrl) {
      feeds.push({
        title: outline['@_text'] || outline['@_title'] || xmlUrl,
        url: xmlUrl,
        site_url: outline['@_htmlUrl'] || null,
        description: outline['@_description'] || null,
      });
    }
    if (outline.outline) {
      collectFeeds(outline.outline, feeds);
    }
  }
}

export function parseOpml(xml: string): FeedInput[] {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new Error(`OPML parsing failed: ${valid.err.msg} (line ${valid.err.line})`);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    isArray: (name) => name === 'outline',
  });
  const parsed = opmlSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw new Error('OPML parsing failed: missing <opml> document');
  }

  const body = parsed.data.opml.body;
  const feeds: FeedInput[] = [];
  if (body) {
    collectFeeds(body.outline ?? [], feeds);
  }
  return feeds;
}

export function buildOpml(feeds: Feed[]): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    suppressEmptyNode: true,
  });

  const outlines = feeds.map((feed) => ({
    '@_type': 'rss',
    '@_text': feed.title,
    '@_title': feed.title,
    '@_xmlUrl': feed.url,
    ...(feed.site_url ? { '@_htmlUrl': feed.site_url } : {}),
    ...(feed.description ? { '@_description': feed.description } : {}),
  }));

  const body = builder.build({
    opml: {
      '@_version': '2.0',
      head: { title: 'rss-triage subscriptions', dateCreated: new Date().toUTCString() },
      body: { outline: outlines },
    },
  });
  return `<?xml version="1.0" encoding="UTF-8"?>\n${body}`;
}

/** Adds every feed in the file whose URL is not stored yet. */
export function importOpmlFile(cache: CacheService, path: string): OpmlImportResult {
  const inputs = parseOpml(readFileSync(path, 'utf-8'));
  const added: Feed[] = [];
  let skipped = 0;

  for (const input of inputs) {
    if (cache.getFeedByUrl(input.url)) {
      skipped++;
      continue;
    }
    added.push(cache.addFeed(input));
  }
  return { added, skipped };
}

export function exportOpmlFile(cache: CacheService, path: string): number {
  const feeds = cache.getAllFeeds();
  writeFileSync(path, buildOpml(feeds), 'utf-8');
  return feeds.length;
}
