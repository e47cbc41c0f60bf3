import { z } from 'zod';
import { CONFIG_KEYS } from '../models/config.js';
import { RemoteServiceError } from '../utils/errors.js';
import type { ConfigService } from '../utils/config.js';
import type { Logger } from '../utils/logger.js';
import type { HttpRequester, HttpTimeouts } from './http.js';

const RAINDROP_API_URL = 'https://api.raindrop.io/rest/v1';
const BOOKMARK_TIMEOUTS: HttpTimeouts = { connectMs: 10_000, totalMs: 30_000 };

const raindropResponseSchema = z.object({
  result: z.boolean().optional(),
  item: z.object({ _id: z.number() }).nullable().optional(),
  errorMessage: z.string().optional(),
});

export interface BookmarkRequest {
  url: string;
  title?: string | null;
  excerpt?: string | null;
  tags: string[];
}

export interface BookmarkClient {
  saveBookmark(request: BookmarkRequest): Promise<number>;
}

/** Saves links to Raindrop.io and returns the new bookmark id. */
export class BookmarkService implements BookmarkClient {
  constructor(
    private readonly http: HttpRequester,
    private readonly config: ConfigService,
    private readonly logger: Logger,
  ) {}

  private getToken(): string {
    const token = this.config.get(CONFIG_KEYS.RAINDROP_TOKEN);
    if (!token) {
      throw new Error('RAINDROP_TOKEN not set (use .env or "rss-triage config set raindrop_token <token>")');
    }
    return token;
  }

  async saveBookmark(request: BookmarkRequest): Promise<number> {
    const token = this.getToken();

    const response = await this.http.request(`${RAINDROP_API_URL}/raindrop`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${token}`,
      },
      body: JSON.stringify({
        link: request.url,
        title: request.title ?? undefined,
        excerpt: request.excerpt ?? undefined,
        tags: request.tags,
        pleaseParse: {},
      }),
      timeouts: BOOKMARK_TIMEOUTS,
    });

    if (!response.ok) {
      throw new RemoteServiceError('Raindrop', response.body || response.statusText, response.status);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch {
      throw new RemoteServiceError('Raindrop', 'response was not JSON', response.status);
    }

    const parsed = raindropResponseSchema.safeParse(payload);
    const id = parsed.success ? parsed.data.item?._id : undefined;
    if (id === undefined) {
      throw new RemoteServiceError('Raindrop', 'No item returned from API');
    }

    this.logger.debug(`[Raindrop] Saved ${request.url} as ${id}`);
    return id;
  }
}
