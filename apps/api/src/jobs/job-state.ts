import type { AggregateResult } from '../aggregation/aggregate';
import { InvalidTransitionError } from '../common/errors';
import type { Job, JobStatus, MediaOutcome, TerminalStatus, WorkUnit } from './jobs.types';

// Terminal states only leave through reprocess (back to PENDING).
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  PENDING: ['IN_PROGRESS', 'PENDING'],
  IN_PROGRESS: ['COMPLETED', 'COMPLETED_WITH_WARNINGS', 'FAILED', 'PENDING'],
  COMPLETED: ['PENDING'],
  COMPLETED_WITH_WARNINGS: ['PENDING'],
  FAILED: ['PENDING'],
};

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return status === 'COMPLETED' || status === 'COMPLETED_WITH_WARNINGS' || status === 'FAILED';
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
}

export function resolveTerminalStatus(aggregate: AggregateResult): TerminalStatus {
  const { total, errored } = aggregate.counts;
  if (errored === total) return 'FAILED';
  if (errored === 0 && aggregate.status === 'SAFE') return 'COMPLETED';
  return 'COMPLETED_WITH_WARNINGS';
}

export function failureMessage(aggregate: AggregateResult): string {
  const { total, errored } = aggregate.counts;
  if (aggregate.failures.length > 0 && aggregate.failures.every((f) => f.reason === 'DISPATCH_FAILED')) {
    return `Dispatch failed: none of ${total} work unit(s) could be enqueued`;
  }
  return `All ${errored} of ${total} media item(s) failed analysis`;
}

export function findMedia(job: Job, unit: Pick<WorkUnit, 'postId' | 'mediaId'>) {
  const post = job.posts.find((p) => p.postId === unit.postId);
  return post?.media.find((m) => m.mediaId === unit.mediaId);
}

export function withOutcome(job: Job, unit: Pick<WorkUnit, 'postId' | 'mediaId'>, outcome: MediaOutcome): Job {
  return {
    ...job,
    posts: job.posts.map((post) =>
      post.postId !== unit.postId
        ? post
        : {
            ...post,
            media: post.media.map((media) =>
              media.mediaId !== unit.mediaId
                ? media
                : {
                    ...media,
                    result: outcome.kind === 'result' ? outcome.result : null,
                    error: outcome.kind === 'error' ? outcome.error : null,
                  },
            ),
          },
    ),
  };
}

export function resetForReprocess(job: Job): Job {
  return {
    ...job,
    status: 'PENDING',
    generation: job.generation + 1,
    aggregate: null,
    summary: null,
    error: null,
    posts: job.posts.map((post) => ({
      ...post,
      media: post.media.map((media) => ({ ...media, result: null, error: null })),
    })),
  };
}
