import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { JobStore } from '../config/analysis.config';
import { ModerationModule } from '../moderation/moderation.module';
import { QueueModule } from '../queue/queue.module';
import { SummaryModule } from '../summary/summary.module';
import { AnalysisJobEntity } from './entities/analysis-job.entity';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';
import { InMemoryJobRepository } from './repositories/in-memory-job.repository';
import { JobRepository } from './repositories/job.repository';
import { TypeOrmJobRepository } from './repositories/typeorm-job.repository';

@Module({})
export class JobsModule {
  static register(options: { store: JobStore }): DynamicModule {
    const postgres = options.store === 'postgres';
    return {
      module: JobsModule,
      imports: [
        ModerationModule,
        SummaryModule,
        QueueModule,
        ...(postgres ? [TypeOrmModule.forFeature([AnalysisJobEntity])] : []),
      ],
      controllers: [JobsController],
      providers: [
        JobsService,
        { provide: JobRepository, useClass: postgres ? TypeOrmJobRepository : InMemoryJobRepository },
      ],
    };
  }
}
