import fetch, { type RequestInit } from 'node-fetch';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { HttpStatusError, TimeoutError, TransportError } from '../utils/errors.js';

export interface HttpTimeouts {
  /** Time allowed until response headers arrive. */
  connectMs: number;
  /** Time allowed for the whole exchange, body included. */
  totalMs: number;
}

export const FEED_TIMEOUTS: HttpTimeouts = { connectMs: 10_000, totalMs: 30_000 };

export interface HttpRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeouts?: HttpTimeouts;
}

export interface HttpResponse {
  url: string;
  status: number;
  ok: boolean;
  statusText: string;
  body: string;
}

/** The slice of the client the feed pipeline depends on. */
export interface TextFetcher {
  fetchText(url: string): Promise<string>;
}

/** The slice the remote API clients depend on. */
export interface HttpRequester {
  request(url: string, request?: HttpRequest): Promise<HttpResponse>;
}

export interface HttpClientOptions {
  proxyUrl?: string | null;
  userAgent?: string;
  timeouts?: HttpTimeouts;
}

export class HttpClient implements TextFetcher, HttpRequester {
  private readonly proxyUrl: string | null;
  private readonly userAgent: string;
  private readonly timeouts: HttpTimeouts;

  constructor(options: HttpClientOptions = {}) {
    this.proxyUrl = options.proxyUrl ?? null;
    this.userAgent = options.userAgent ?? 'Mozilla/5.0 (compatible; rss-triage/0.1)';
    this.timeouts = options.timeouts ?? FEED_TIMEOUTS;
  }

  async request(url: string, request: HttpRequest = {}): Promise<HttpResponse> {
    const timeouts = request.timeouts ?? this.timeouts;
    const controller = new AbortController();
    const connectTimer = setTimeout(() => {
      controller.abort(new TimeoutError(url, 'connect', timeouts.connectMs));
    }, timeouts.connectMs);
    const totalTimer = setTimeout(() => {
      controller.abort(new TimeoutError(url, 'total', timeouts.totalMs));
    }, timeouts.totalMs);

    const options: RequestInit = {
      method: request.method ?? 'GET',
      headers: {
        'User-Agent': this.userAgent,
        ...request.headers,
      },
      body: request.body,
      signal: controller.signal,
    };

    if (this.proxyUrl) {
      options.agent = new HttpsProxyAgent(this.proxyUrl);
    }

    try {
      const response = await fetch(url, options);
      clearTimeout(connectTimer);
      const body = await response.text();
      return {
        url,
        status: response.status,
        ok: response.ok,
        statusText: response.statusText,
        body,
      };
    } catch (error) {
      const reason: unknown = controller.signal.reason;
      if (reason instanceof TimeoutError) throw reason;
      throw new TransportError(url, error);
    } finally {
      clearTimeout(connectTimer);
      clearTimeout(totalTimer);
    }
  }

  async fetchText(url: string): Promise<string> {
    const response = await this.request(url, {
      headers: { Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, text/html, */*' },
    });
    if (!response.ok) {
      throw new HttpStatusError(url, response.status, response.statusText);
    }
    return response.body;
  }
}
