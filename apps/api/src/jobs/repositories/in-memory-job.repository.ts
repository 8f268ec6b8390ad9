import { Injectable } from '@nestjs/common';
import { NotFoundError, VersionConflictError } from '../../common/errors';
import type { Job } from '../jobs.types';
import { JobMutation, JobRepository } from './job.repository';

@Injectable()
export class InMemoryJobRepository extends JobRepository {
  private readonly store = new Map<string, Job>();

  async create(job: Job): Promise<Job> {
    if (this.store.has(job.id)) {
      throw new Error(`Job ${job.id} already exists`);
    }
    this.store.set(job.id, structuredClone(job));
    return structuredClone(job);
  }

  async get(jobId: string): Promise<Job> {
    const job = this.store.get(jobId);
    if (!job) throw new NotFoundError(jobId);
    return structuredClone(job);
  }

  async conditionalUpdate(jobId: string, expectedVersion: number, mutation: JobMutation): Promise<Job> {
    const current = this.store.get(jobId);
    if (!current) throw new NotFoundError(jobId);
    if (current.version !== expectedVersion) {
      throw new VersionConflictError(jobId, expectedVersion, current.version);
    }
    const next: Job = {
      ...mutation(structuredClone(current)),
      id: jobId,
      version: expectedVersion + 1,
      updatedAt: new Date(),
    };
    this.store.set(jobId, structuredClone(next));
    return next;
  }
}
