import axios, { AxiosInstance } from 'axios';
import type { AggregateResult } from '../aggregation/aggregate';
import { SummaryClient, SummaryFailure, buildSummaryPrompt } from './summary.client';

const API_URL = 'https://api.anthropic.com/v1/messages';
const API_VERSION = '2023-06-01';
const MAX_TOKENS = 200;

export interface AnthropicSummaryOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class AnthropicSummaryClient extends SummaryClient {
  constructor(
    private readonly options: AnthropicSummaryOptions,
    private readonly http: AxiosInstance = axios.create(),
  ) {
    super();
  }

  async summarize(aggregate: AggregateResult): Promise<string> {
    let body: unknown;
    try {
      const response = await this.http.post<unknown>(
        API_URL,
        {
          model: this.options.model,
          max_tokens: MAX_TOKENS,
          messages: [{ role: 'user', content: buildSummaryPrompt(aggregate) }],
        },
        {
          timeout: this.options.timeoutMs,
          headers: {
            'x-api-key': this.options.apiKey,
            'anthropic-version': API_VERSION,
            'content-type': 'application/json',
          },
        },
      );
      body = response.data;
    } catch (err) {
      if (axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')) {
        throw new SummaryFailure(`Summary request timed out after ${this.options.timeoutMs}ms`);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new SummaryFailure(`Summary request failed: ${message}`);
    }

    const text = extractText(body);
    if (!text) {
      throw new SummaryFailure('Summary response contained no text');
    }
    return text;
  }
}

function extractText(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('content' in body)) return null;
  const { content } = body;
  if (!Array.isArray(content)) return null;
  const parts: string[] = [];
  for (const block of content) {
    if (typeof block === 'object' && block !== null && 'text' in block && typeof block.text === 'string') {
      parts.push(block.text);
    }
  }
  const text = parts.join('').trim();
  return text.length > 0 ? text : null;
}
