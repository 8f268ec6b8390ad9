import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { NotFoundError, VersionConflictError } from '../../common/errors';
import { AnalysisJobEntity } from '../entities/analysis-job.entity';
import type { Job } from '../jobs.types';
import { JobMutation, JobRepository } from './job.repository';

function toJob(entity: AnalysisJobEntity): Job {
  return {
    id: entity.id,
    campaignId: entity.campaign_id,
    creatorId: entity.creator_id,
    status: entity.status,
    posts: entity.posts,
    aggregate: entity.aggregate_json,
    summary: entity.summary,
    error: entity.error_message,
    version: entity.version,
    generation: entity.generation,
    createdAt: entity.created_at,
    updatedAt: entity.updated_at,
  };
}

@Injectable()
export class TypeOrmJobRepository extends JobRepository {
  constructor(
    @InjectRepository(AnalysisJobEntity)
    private readonly jobRepo: Repository<AnalysisJobEntity>,
  ) {
    super();
  }

  async create(job: Job): Promise<Job> {
    const entity = this.jobRepo.create({
      id: job.id,
      campaign_id: job.campaignId,
      creator_id: job.creatorId,
      status: job.status,
      posts: job.posts,
      aggregate_json: job.aggregate,
      summary: job.summary,
      error_message: job.error,
      version: job.version,
      generation: job.generation,
      created_at: job.createdAt,
      updated_at: job.updatedAt,
    });
    return toJob(await this.jobRepo.save(entity));
  }

  async get(jobId: string): Promise<Job> {
    const entity = await this.jobRepo.findOne({ where: { id: jobId } });
    if (!entity) throw new NotFoundError(jobId);
    return toJob(entity);
  }

  async conditionalUpdate(jobId: string, expectedVersion: number, mutation: JobMutation): Promise<Job> {
    const current = await this.get(jobId);
    if (current.version !== expectedVersion) {
      throw new VersionConflictError(jobId, expectedVersion, current.version);
    }

    const next = mutation(current);
    const version = expectedVersion + 1;
    const updatedAt = new Date();
    // The version predicate makes the write a compare-and-swap.
    const result = await this.jobRepo.update(
      { id: jobId, version: expectedVersion },
      {
        status: next.status,
        posts: next.posts,
        aggregate_json: next.aggregate,
        summary: next.summary,
        error_message: next.error,
        generation: next.generation,
        version,
        updated_at: updatedAt,
      },
    );
    if (!result.affected) {
      const latest = await this.get(jobId);
      throw new VersionConflictError(jobId, expectedVersion, latest.version);
    }
    return { ...next, id: jobId, version, updatedAt };
  }
}
