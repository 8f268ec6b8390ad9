import type { CategoryScores, MediaRef } from '../jobs/jobs.types';

export abstract class ModerationProviderError extends Error {
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly provider: string,
  ) {
    super(message);
  }
}

export class ProviderTimeoutError extends ModerationProviderError {
  readonly retryable = true;

  constructor(provider: string, timeoutMs: number) {
    super(`${provider} did not respond within ${timeoutMs}ms`, provider);
    this.name = 'ProviderTimeoutError';
  }
}

export class ProviderError extends ModerationProviderError {
  readonly retryable = true;

  constructor(message: string, provider: string) {
    super(message, provider);
    this.name = 'ProviderError';
  }
}

/** The media itself cannot be processed; retrying will not help. */
export class InvalidMediaError extends ModerationProviderError {
  readonly retryable = false;

  constructor(message: string, provider: string) {
    super(message, provider);
    this.name = 'InvalidMediaError';
  }
}

/**
 * Scores one media item. Implementations return risk probabilities per
 * category and reject with a {@link ModerationProviderError}.
 */
export abstract class ModerationClient {
  abstract readonly name: string;

  abstract analyze(media: MediaRef): Promise<CategoryScores>;
}
