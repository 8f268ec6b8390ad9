import type { Job } from '../jobs.types';

export type JobMutation = (current: Job) => Job;

/** Every successful write bumps `version` and `updatedAt`. */
export abstract class JobRepository {
  abstract create(job: Job): Promise<Job>;

  abstract get(jobId: string): Promise<Job>;

  /** Throws VersionConflictError when the stored version is no longer `expectedVersion`. */
  abstract conditionalUpdate(jobId: string, expectedVersion: number, mutation: JobMutation): Promise<Job>;
}
