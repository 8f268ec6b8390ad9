import { Module } from '@nestjs/common';
import { ANALYSIS_CONFIG, AnalysisConfig } from '../config/analysis.config';
import { FakeModerationClient } from './fake-moderation.client';
import { MediaWorker } from './media-worker';
import { ModerationClient } from './moderation.client';
import { InMemoryResultCache, ResultCache } from './result-cache';
import { SightengineModerationClient } from './sightengine.client';

export function createModerationClient(config: AnalysisConfig): ModerationClient {
  const { apiUser, apiSecret, models } = config.sightengine;
  if (config.useFakeAi) return new FakeModerationClient();
  if (!apiUser || !apiSecret) {
    throw new Error('Sightengine credentials are not configured');
  }
  return new SightengineModerationClient({
    apiUser,
    apiSecret,
    models,
    timeoutMs: config.moderationTimeoutMs,
  });
}

@Module({
  providers: [
    { provide: ModerationClient, useFactory: createModerationClient, inject: [ANALYSIS_CONFIG] },
    { provide: ResultCache, useClass: InMemoryResultCache },
    MediaWorker,
  ],
  exports: [MediaWorker, ResultCache],
})
export class ModerationModule {}
