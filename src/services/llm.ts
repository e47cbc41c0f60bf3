import { z } from 'zod';
import { CONFIG_KEYS } from '../models/config.js';
import { RemoteServiceError } from '../utils/errors.js';
import type { ConfigService } from '../utils/config.js';
import type { Logger } from '../utils/logger.js';
import type { HttpRequester, HttpTimeouts } from './http.js';

// Article bytes sent per request
export const MAX_CONTENT_BYTES = 10_000;
const MAX_OUTPUT_TOKENS = 1024;
const LLM_TIMEOUTS: HttpTimeouts = { connectMs: 10_000, totalMs: 120_000 };

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

// Label lines the model sometimes emits before the actual summary
const PREAMBLE_PATTERNS: RegExp[] = [
  /^this is (an? )?(editorial|product)\b/,
  /^(format|type|summary type)\s*:\s*(editorial|product)\.?$/,
  /^\**(editorial|product)( summary)?\**:?$/,
  /^here('s| is) (the|a|my) summary\b.*:$/,
];

export interface LlmConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
}

export interface Summarizer {
  readonly modelVersion: string;
  generateSummary(title: string, content: string): Promise<string>;
}

/**
 * Cuts `text` to at most `maxBytes` of UTF-8 without splitting a character.
 */
export function truncateUtf8(text: string, maxBytes: number = MAX_CONTENT_BYTES): string {
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length <= maxBytes) return text;

  let end = maxBytes;
  // Step back over continuation bytes (10xxxxxx) to a character start
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }
  return bytes.subarray(0, end).toString('utf8');
}

export function stripPreamble(text: string): string {
  return text
    .split('\n')
    .filter((line) => {
      const lower = line.trim().toLowerCase();
      return !PREAMBLE_PATTERNS.some((pattern) => pattern.test(lower));
    })
    .join('\n')
    .trim();
}

export function buildSummaryPrompt(title: string, content: string): string {
  return `You are a journalist writing in Axios Smart Brevity style. Summarize the article below using the appropriate format.

First, decide whether the article is mainly about a specific PRODUCT (hardware, software, app, device) or is EDITORIAL (news, policy, analysis, industry event).

RULES:
1. Use ONLY information from the article, no outside knowledge
2. Keep each line to 1-2 concise sentences
3. If the article has too little content, reply with just: "Insufficient content for summary"
4. If there is a direct quote with a clear speaker, include the most important one
5. Output ONLY the summary lines below, with no introduction, conclusion or commentary
6. Do NOT name the format you picked; start directly with the first line

EDITORIAL format:
What's happening: One strong sentence with the core news or development.
Why it matters: 1-2 sentences on why this is significant.
The big picture: One sentence on broader implications. Omit if the article is too narrow.
"quote text" -- Speaker Name

PRODUCT format:
The product: What it is and what it does (1-2 sentences).
Cost: Pricing details. Omit if not mentioned.
Availability: When and where it is available. Omit if not mentioned.
Platforms: Supported platforms or operating systems. Omit for hardware-only products or if not mentioned.
"quote text" -- Speaker Name

Omit the quote line when there is no attributed quote.

Title: ${title}

Article:
${content}`;
}

export class LlmService implements Summarizer {
  constructor(
    private readonly http: HttpRequester,
    private readonly config: ConfigService,
    private readonly logger: Logger,
  ) {}

  private getLlmConfig(): LlmConfig {
    const apiKey = this.config.get(CONFIG_KEYS.LLM_API_KEY);
    const baseUrl = this.config.get(CONFIG_KEYS.LLM_BASE_URL);
    const model = this.config.get(CONFIG_KEYS.LLM_MODEL);

    if (!apiKey) {
      throw new Error('LLM_API_KEY not set (use .env or "rss-triage config set llm_api_key <key>")');
    }
    if (!baseUrl) {
      throw new Error('LLM_BASE_URL not set');
    }
    if (!model) {
      throw new Error('LLM_MODEL not set');
    }

    return { apiKey, baseUrl: baseUrl.replace(/\/+$/, ''), model };
  }

  get modelVersion(): string {
    return this.config.get(CONFIG_KEYS.LLM_MODEL) ?? 'unknown';
  }

  private async chatCompletion(prompt: string): Promise<string> {
    const config = this.getLlmConfig();
    const url = `${config.baseUrl}/chat/completions`;

    this.logger.debug(`[LLM] Calling ${url} with model ${config.model}`);

    const response = await this.http.request(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${config.apiKey}`,
      },
      body: JSON.stringify({
        model: config.model,
        max_tokens: MAX_OUTPUT_TOKENS,
        temperature: 0.3,
        messages: [{ role: 'user', content: prompt }],
      }),
      timeouts: LLM_TIMEOUTS,
    });

    if (!response.ok) {
      this.logger.error(`[LLM] HTTP Error ${response.status}: ${response.body.slice(0, 500)}`);
      throw new RemoteServiceError('Summarizer', response.body || response.statusText, response.status);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch {
      throw new RemoteServiceError('Summarizer', 'response was not JSON', response.status);
    }

    const parsed = chatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new RemoteServiceError('Summarizer', `unexpected response shape: ${parsed.error.issues[0]?.message}`);
    }

    this.logger.debug(`[LLM] Response received, tokens: ${parsed.data.usage?.total_tokens ?? 'unknown'}`);

    return parsed.data.choices
      .map((choice) => choice.message.content ?? '')
      .join('\n');
  }

  async generateSummary(title: string, content: string): Promise<string> {
    const summary = stripPreamble(await this.chatCompletion(buildSummaryPrompt(title, content)));
    if (!summary) {
      throw new RemoteServiceError('Summarizer', 'empty summary returned');
    }
    return summary;
  }
}
