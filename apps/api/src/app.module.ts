import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { resolveJobStore } from './config/analysis.config';
import { AnalysisConfigModule } from './config/config.module';
import { AnalysisJobEntity } from './jobs/entities/analysis-job.entity';
import { JobsModule } from './jobs/jobs.module';

const dbUrl = process.env.DATABASE_URL;
const jobStore = resolveJobStore();

const dbConfig = dbUrl
  ? {
      type: 'postgres' as const,
      url: dbUrl,
      ssl: { rejectUnauthorized: false },
      entities: [AnalysisJobEntity],
      synchronize: true,
    }
  : {
      type: 'postgres' as const,
      host: process.env.DB_HOST || 'localhost',
      port: parseInt(process.env.DB_PORT || '5432', 10),
      username: process.env.DB_USERNAME || 'postgres',
      password: process.env.DB_PASSWORD || 'postgres',
      database: process.env.DB_DATABASE || 'content_analysis',
      entities: [AnalysisJobEntity],
      synchronize: true,
    };

@Module({
  imports: [
    AnalysisConfigModule,
    ...(jobStore === 'postgres' ? [TypeOrmModule.forRoot(dbConfig)] : []),
    JobsModule.register({ store: jobStore }),
  ],
})
export class AppModule {}
