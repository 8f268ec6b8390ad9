import axios, { AxiosInstance } from 'axios';
import type { CategoryScores, MediaRef } from '../jobs/jobs.types';
import {
  InvalidMediaError,
  ModerationClient,
  ModerationProviderError,
  ProviderError,
  ProviderTimeoutError,
} from './moderation.client';

const BASE_URL = 'https://api.sightengine.com/1.0';
const PROVIDER = 'sightengine';

// Keys whose values are not risk probabilities: "none" is the safe class,
// the rest describe context or attributes of a detection.
const IGNORED_KEYS = new Set(['none', 'context', 'firearm_type', 'firearm_action']);

export interface SightengineOptions {
  apiUser: string;
  apiSecret: string;
  models: string[];
  timeoutMs: number;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Highest risk probability anywhere in a model's payload. */
export function maxRisk(payload: unknown): number | null {
  if (typeof payload === 'number') return Number.isFinite(payload) ? payload : null;
  if (!isRecord(payload)) return null;
  let max: number | null = null;
  for (const [key, value] of Object.entries(payload)) {
    if (IGNORED_KEYS.has(key)) continue;
    const risk = maxRisk(value);
    if (risk !== null && (max === null || risk > max)) max = risk;
  }
  return max;
}

export function scoresFromPayload(payload: JsonRecord, models: string[]): CategoryScores {
  const scores: CategoryScores = {};
  for (const model of models) {
    scores[model] = maxRisk(payload[model]);
  }
  return scores;
}

function mergeFrameScores(frames: CategoryScores[], models: string[]): CategoryScores {
  const scores: CategoryScores = {};
  for (const model of models) {
    let max: number | null = null;
    for (const frame of frames) {
      const value = frame[model];
      if (value !== null && value !== undefined && (max === null || value > max)) max = value;
    }
    scores[model] = max;
  }
  return scores;
}

export class SightengineModerationClient extends ModerationClient {
  readonly name = PROVIDER;

  constructor(
    private readonly options: SightengineOptions,
    private readonly http: AxiosInstance = axios.create({ baseURL: BASE_URL }),
  ) {
    super();
  }

  async analyze(media: MediaRef): Promise<CategoryScores> {
    const path = media.type === 'video' ? '/video/check-sync.json' : '/check.json';
    const payload = await this.request(path, media.url);

    if (media.type === 'image') {
      return scoresFromPayload(payload, this.options.models);
    }

    const data = payload.data;
    const frames = isRecord(data) && Array.isArray(data.frames) ? data.frames.filter(isRecord) : [];
    if (frames.length === 0) {
      throw new ProviderError('Sightengine returned no video frames', PROVIDER);
    }
    return mergeFrameScores(
      frames.map((frame) => scoresFromPayload(frame, this.options.models)),
      this.options.models,
    );
  }

  private async request(path: string, url: string): Promise<JsonRecord> {
    let body: unknown;
    try {
      const response = await this.http.get<unknown>(path, {
        timeout: this.options.timeoutMs,
        params: {
          url,
          models: this.options.models.join(','),
          api_user: this.options.apiUser,
          api_secret: this.options.apiSecret,
        },
      });
      body = response.data;
    } catch (err) {
      throw this.toProviderError(err);
    }

    if (!isRecord(body)) {
      throw new ProviderError('Sightengine returned a non-JSON body', PROVIDER);
    }
    if (body.status !== 'success') {
      throw this.fromFailureBody(body);
    }
    return body;
  }

  private fromFailureBody(body: JsonRecord): ModerationProviderError {
    const error = isRecord(body.error) ? body.error : {};
    const message = typeof error.message === 'string' ? error.message : 'unknown error';
    if (error.type === 'media_error') {
      return new InvalidMediaError(`Sightengine could not process media: ${message}`, PROVIDER);
    }
    return new ProviderError(`Sightengine API error: ${message}`, PROVIDER);
  }

  private toProviderError(err: unknown): ModerationProviderError {
    if (!axios.isAxiosError(err)) {
      return new ProviderError(err instanceof Error ? err.message : String(err), PROVIDER);
    }
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return new ProviderTimeoutError(PROVIDER, this.options.timeoutMs);
    }
    const data: unknown = err.response?.data;
    if (isRecord(data) && data.status === 'failure') {
      return this.fromFailureBody(data);
    }
    if (err.response) {
      return new ProviderError(`Sightengine returned HTTP ${err.response.status}`, PROVIDER);
    }
    return new ProviderError(`Network error while calling Sightengine: ${err.message}`, PROVIDER);
  }
}
