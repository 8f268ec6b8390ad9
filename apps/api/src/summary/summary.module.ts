import { Module } from '@nestjs/common';
import { ANALYSIS_CONFIG, AnalysisConfig } from '../config/analysis.config';
import { AnthropicSummaryClient } from './anthropic-summary.client';
import { FakeSummaryClient } from './fake-summary.client';
import { SummaryClient } from './summary.client';

/** Null when summaries are disabled; the orchestrator then skips the step. */
export function createSummaryClient(config: AnalysisConfig): SummaryClient | null {
  if (!config.summaryEnabled) return null;
  if (config.useFakeAi) return new FakeSummaryClient();
  if (!config.anthropic.apiKey) {
    throw new Error('ANTHROPIC_API_KEY is not configured');
  }
  return new AnthropicSummaryClient({
    apiKey: config.anthropic.apiKey,
    model: config.anthropic.model,
    timeoutMs: config.summaryTimeoutMs,
  });
}

@Module({
  providers: [{ provide: SummaryClient, useFactory: createSummaryClient, inject: [ANALYSIS_CONFIG] }],
  exports: [SummaryClient],
})
export class SummaryModule {}
