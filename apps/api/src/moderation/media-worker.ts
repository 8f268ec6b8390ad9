import { Inject, Injectable, Logger } from '@nestjs/common';
import { sleep, withTimeout } from '../common/async';
import { errorMessage } from '../common/errors';
import { ANALYSIS_CONFIG, AnalysisConfig } from '../config/analysis.config';
import type { CategoryScores, Media, MediaErrorReason, MediaOutcome, MediaResult } from '../jobs/jobs.types';
import { classifyScores, invalidCategories } from './category-scores';
import { contentFingerprint } from './fingerprint';
import {
  InvalidMediaError,
  ModerationClient,
  ModerationProviderError,
  ProviderError,
  ProviderTimeoutError,
} from './moderation.client';
import { ResultCache } from './result-cache';

export const MAX_RETRY_DELAY_MS = 30_000;

export function retryDelay(attempt: number, baseMs: number): number {
  return Math.min(baseMs * 2 ** (attempt - 1), MAX_RETRY_DELAY_MS);
}

function reasonFor(err: ModerationProviderError): MediaErrorReason {
  if (err instanceof ProviderTimeoutError) return 'PROVIDER_TIMEOUT';
  if (err instanceof InvalidMediaError) return 'INVALID_MEDIA';
  return 'PROVIDER_ERROR';
}

/**
 * Moderates a single media item. Always resolves with exactly one outcome;
 * provider failures become a MediaError instead of propagating.
 */
@Injectable()
export class MediaWorker {
  private readonly logger = new Logger(MediaWorker.name);
  private readonly knownSafe: Set<string>;
  private readonly inFlight = new Map<string, Promise<MediaOutcome>>();

  constructor(
    private readonly moderation: ModerationClient,
    private readonly cache: ResultCache,
    @Inject(ANALYSIS_CONFIG) private readonly config: AnalysisConfig,
  ) {
    this.knownSafe = new Set(config.knownSafeFingerprints);
  }

  async process(media: Media): Promise<MediaOutcome> {
    const fingerprint = contentFingerprint(media);

    if (this.knownSafe.has(fingerprint)) {
      return {
        kind: 'result',
        result: { scores: {}, status: 'SAFE', contentFingerprint: fingerprint, skipped: true, cached: false },
      };
    }

    const cached = await this.cache.get(fingerprint);
    if (cached) {
      return { kind: 'result', result: { ...cached, cached: true } };
    }

    // Identical content already being moderated by a sibling unit: share its call.
    const pending = this.inFlight.get(fingerprint);
    if (pending) {
      const shared = await pending;
      return shared.kind === 'result' ? { kind: 'result', result: { ...shared.result, cached: true } } : shared;
    }

    const call = this.moderate(media, fingerprint);
    this.inFlight.set(fingerprint, call);
    try {
      return await call;
    } finally {
      this.inFlight.delete(fingerprint);
    }
  }

  private async moderate(media: Media, fingerprint: string): Promise<MediaOutcome> {
    const maxAttempts = this.config.retryLimit + 1;
    for (let attempt = 1; ; attempt++) {
      try {
        const scores = await this.callProvider(media);
        const result: MediaResult = {
          scores,
          status: classifyScores(scores, this.config.thresholds),
          contentFingerprint: fingerprint,
          skipped: false,
          cached: false,
        };
        await this.cache.put(fingerprint, result);
        return { kind: 'result', result };
      } catch (err) {
        const providerErr =
          err instanceof ModerationProviderError ? err : new ProviderError(errorMessage(err), this.moderation.name);

        if (!providerErr.retryable || attempt >= maxAttempts) {
          this.logger.warn(
            `Media ${media.mediaId} failed after ${attempt} attempt(s): ${providerErr.message}`,
          );
          return {
            kind: 'error',
            error: { reason: reasonFor(providerErr), message: providerErr.message, attempts: attempt },
          };
        }

        const delay = retryDelay(attempt, this.config.retryBaseDelayMs);
        this.logger.warn(
          `Media ${media.mediaId} attempt ${attempt}/${maxAttempts} failed (${providerErr.message}), retrying in ${delay}ms`,
        );
        await sleep(delay);
      }
    }
  }

  private async callProvider(media: Media): Promise<CategoryScores> {
    const timeoutMs = this.config.moderationTimeoutMs;
    const scores = await withTimeout(
      this.moderation.analyze({ type: media.type, url: media.url }),
      timeoutMs,
      () => new ProviderTimeoutError(this.moderation.name, timeoutMs),
    );

    const invalid = invalidCategories(scores);
    if (invalid.length > 0) {
      throw new ProviderError(
        `${this.moderation.name} returned out-of-range scores for: ${invalid.join(', ')}`,
        this.moderation.name,
      );
    }
    return scores;
  }
}
