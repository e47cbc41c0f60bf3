import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { closeDb, openDb, type Db } from '../../db/index.js';
import { ConfigService } from '../../utils/config.js';
import { RemoteServiceError } from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';
import { LlmService, MAX_CONTENT_BYTES, stripPreamble, truncateUtf8 } from '../llm.js';
import type { HttpRequest, HttpRequester, HttpResponse } from '../http.js';

class FakeHttp implements HttpRequester {
  readonly calls: { url: string; request: HttpRequest }[] = [];

  constructor(private readonly response: Omit<HttpResponse, 'url'>) {}

  async request(url: string, request: HttpRequest = {}): Promise<HttpResponse> {
    this.calls.push({ url, request });
    return { url, ...this.response };
  }
}

function chatReply(content: string): Omit<HttpResponse, 'url'> {
  return {
    status: 200,
    ok: true,
    statusText: 'OK',
    body: JSON.stringify({ choices: [{ message: { content }, finish_reason: 'stop' }] }),
  };
}

describe('truncateUtf8', () => {
  it('returns short text unchanged', () => {
    expect(truncateUtf8('short', 10)).toBe('short');
  });

  it('cuts on a character boundary', () => {
    expect(truncateUtf8('héllo', 2)).toBe('h');
    expect(truncateUtf8('日本語', 7)).toBe('日本');
    expect(truncateUtf8('日本語', 6)).toBe('日本');
  });

  it('defaults to the request budget', () => {
    const truncated = truncateUtf8('a'.repeat(MAX_CONTENT_BYTES + 1));
    expect(Buffer.byteLength(truncated, 'utf8')).toBe(MAX_CONTENT_BYTES);
  });
});

describe('stripPreamble', () => {
  it('drops label lines and keeps content lines', () => {
    const raw = [
      'This is an EDITORIAL summary.',
      "What's happening: The council approved the budget.",
      '',
      '**EDITORIAL**',
      'Why it matters: Transit funding doubles.',
    ].join('\n');

    expect(stripPreamble(raw)).toBe(
      "What's happening: The council approved the budget.\n\nWhy it matters: Transit funding doubles."
    );
  });

  it('recognises format declarations and lead-ins', () => {
    const raw = "Here's the summary:\nFormat: PRODUCT\nThe product: A folding bike.\nCost: $900.";
    expect(stripPreamble(raw)).toBe('The product: A folding bike.\nCost: $900.');
  });

  it('keeps lines that merely start with a label word', () => {
    const raw = 'Editorial boards disagree on the plan.';
    expect(stripPreamble(raw)).toBe(raw);
  });
});

describe('LlmService', () => {
  let db: Db;
  const logger = new Logger({ console: false });
  const env = {
    LLM_API_KEY: 'test-key',
    LLM_BASE_URL: 'https://llm.example/v1/',
    LLM_MODEL: 'test-model',
  };

  beforeEach(() => {
    db = openDb(':memory:');
  });

  afterEach(() => {
    closeDb(db);
  });

  it('posts a chat completion and returns the stripped text', async () => {
    const http = new FakeHttp(chatReply("Format: EDITORIAL\nWhat's happening: Rates held."));
    const llm = new LlmService(http, new ConfigService(db, env), logger);

    const summary = await llm.generateSummary('Central bank meets', 'Body text');

    expect(summary).toBe("What's happening: Rates held.");
    expect(http.calls).toHaveLength(1);
    const [{ url, request }] = http.calls;
    expect(url).toBe('https://llm.example/v1/chat/completions');
    expect(request.method).toBe('POST');
    expect(request.headers?.Authorization).toBe('Bearer test-key');

    const body: unknown = JSON.parse(request.body ?? '{}');
    expect(body).toMatchObject({ model: 'test-model', max_tokens: 1024 });
    expect(JSON.stringify(body)).toContain('Title: Central bank meets');
  });

  it('reports the configured model as its version', () => {
    const llm = new LlmService(new FakeHttp(chatReply('x')), new ConfigService(db, env), logger);
    expect(llm.modelVersion).toBe('test-model');
  });

  it('surfaces a non-success response with its body', async () => {
    const http = new FakeHttp({ status: 429, ok: false, statusText: 'Too Many Requests', body: 'rate limited' });
    const llm = new LlmService(http, new ConfigService(db, env), logger);

    const error = await llm.generateSummary('t', 'c').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteServiceError);
    expect(error).toMatchObject({ message: 'Summarizer API error: rate limited', status: 429 });
  });

  it('rejects a summary that is only preamble', async () => {
    const llm = new LlmService(new FakeHttp(chatReply('Format: PRODUCT')), new ConfigService(db, env), logger);
    await expect(llm.generateSummary('t', 'c')).rejects.toThrow('Summarizer API error: empty summary returned');
  });

  it('rejects an unexpected response shape', async () => {
    const http = new FakeHttp({ status: 200, ok: true, statusText: 'OK', body: '{"choices":[]}' });
    const llm = new LlmService(http, new ConfigService(db, env), logger);
    await expect(llm.generateSummary('t', 'c')).rejects.toBeInstanceOf(RemoteServiceError);
  });

  it('requires an API key before calling out', async () => {
    const http = new FakeHttp(chatReply('x'));
    const llm = new LlmService(http, new ConfigService(db, {}), logger);

    await expect(llm.generateSummary('t', 'c')).rejects.toThrow(/LLM_API_KEY not set/);
    expect(http.calls).toHaveLength(0);
  });
});
