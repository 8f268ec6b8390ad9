import { Global, Module } from '@nestjs/common';
import { ANALYSIS_CONFIG, loadAnalysisConfig } from './analysis.config';

@Global()
@Module({
  providers: [{ provide: ANALYSIS_CONFIG, useFactory: () => loadAnalysisConfig() }],
  exports: [ANALYSIS_CONFIG],
})
export class AnalysisConfigModule {}
