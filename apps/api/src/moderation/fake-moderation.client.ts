import type { CategoryScores, MediaRef } from '../jobs/jobs.types';
import { ModerationClient } from './moderation.client';

/** Fixed low-risk scores for local runs with USE_FAKE_AI=true. */
export class FakeModerationClient extends ModerationClient {
  readonly name = 'fake';

  async analyze(media: MediaRef): Promise<CategoryScores> {
    return {
      nudity: 0.01,
      weapon: 0,
      violence: 0.02,
      medical: 0,
      spoof: media.type === 'video' ? 0.05 : 0.01,
    };
  }
}
