import type { AggregateResult } from '../aggregation/aggregate';
import type { MediaStatus } from '../moderation/category-scores';

export const JOB_STATUSES = [
  'PENDING',
  'IN_PROGRESS',
  'COMPLETED',
  'COMPLETED_WITH_WARNINGS',
  'FAILED',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type TerminalStatus = Extract<JobStatus, 'COMPLETED' | 'COMPLETED_WITH_WARNINGS' | 'FAILED'>;

export const MEDIA_TYPES = ['image', 'video'] as const;

export type MediaType = (typeof MEDIA_TYPES)[number];

export type MediaErrorReason =
  | 'PROVIDER_TIMEOUT'
  | 'PROVIDER_ERROR'
  | 'INVALID_MEDIA'
  | 'DISPATCH_FAILED';

/** Category name -> score in [0, 1]; null when the provider reported nothing. */
export type CategoryScores = Record<string, number | null>;

export interface MediaResult {
  scores: CategoryScores;
  status: MediaStatus;
  contentFingerprint: string;
  skipped: boolean;
  cached: boolean;
}

export interface MediaError {
  reason: MediaErrorReason;
  message: string;
  attempts: number;
}

export type MediaOutcome =
  | { kind: 'result'; result: MediaResult }
  | { kind: 'error'; error: MediaError };

export interface MediaRef {
  type: MediaType;
  url: string;
}

export interface Media extends MediaRef {
  mediaId: string;
  result: MediaResult | null;
  error: MediaError | null;
}

export interface Post {
  postId: string;
  media: Media[];
}

export interface Job {
  id: string;
  campaignId: string;
  creatorId: string;
  status: JobStatus;
  posts: Post[];
  aggregate: AggregateResult | null;
  summary: string | null;
  error: string | null;
  version: number;
  generation: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface WorkUnit {
  jobId: string;
  generation: number;
  postId: string;
  mediaId: string;
}

export interface CampaignSubmission {
  campaignId: string;
  creatorId: string;
  posts: Array<{
    postId: string;
    media: Array<{ mediaId: string; type: MediaType; url: string }>;
  }>;
}

export interface JobSnapshot {
  jobId: string;
  campaignId: string;
  creatorId: string;
  status: JobStatus;
  posts: Post[];
  results: AggregateResult | null;
  summary: string | null;
  error: string | null;
  createdAt: string;
  updatedAt: string;
}

export function isResolved(media: Media): boolean {
  return media.result !== null || media.error !== null;
}

export function allMedia(job: Job): Array<{ post: Post; media: Media }> {
  return job.posts.flatMap((post) => post.media.map((media) => ({ post, media })));
}

export function toSnapshot(job: Job): JobSnapshot {
  return {
    jobId: job.id,
    campaignId: job.campaignId,
    creatorId: job.creatorId,
    status: job.status,
    posts: job.posts,
    results: job.aggregate,
    summary: job.summary,
    error: job.error,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  };
}
