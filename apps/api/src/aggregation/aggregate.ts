import type { Thresholds } from '../config/analysis.config';
import type { CategoryScores, Job, MediaErrorReason, Post } from '../jobs/jobs.types';
import { MediaStatus, classifyScore, mean, worstStatus } from '../moderation/category-scores';

// ERRORED: nothing in scope produced a usable result.
export type AggregateStatus = MediaStatus | 'ERRORED';

export interface AggregateCounts {
  total: number;
  analyzed: number;
  skipped: number;
  errored: number;
}

export interface PostAggregate {
  postId: string;
  categories: CategoryScores;
  status: AggregateStatus;
  counts: AggregateCounts;
}

export interface MediaFailure {
  postId: string;
  mediaId: string;
  reason: MediaErrorReason;
  message: string;
}

export interface AggregateResult {
  categories: CategoryScores;
  categoryStatus: Record<string, MediaStatus>;
  explanations: Record<string, string>;
  overallScore: number | null;
  status: AggregateStatus;
  counts: AggregateCounts;
  posts: PostAggregate[];
  failures: MediaFailure[];
}

const NO_DATA = 'No valid data available';

// Flagged categories that always need a human look.
const REVIEW_NOTES: Record<string, string> = {
  spoof: 'Potential spoof or manipulated content detected. Manual review recommended.',
};

// A key reported only as null still appears, with no values.
function collect(sources: CategoryScores[]): Map<string, number[]> {
  const values = new Map<string, number[]>();
  for (const scores of sources) {
    for (const [category, score] of Object.entries(scores)) {
      const list = values.get(category) ?? [];
      if (score !== null) list.push(score);
      values.set(category, list);
    }
  }
  return values;
}

function averageByCategory(sources: CategoryScores[]): CategoryScores {
  const categories: CategoryScores = {};
  for (const [category, values] of collect(sources)) {
    categories[category] = mean(values);
  }
  return categories;
}

function aggregatePost(post: Post): PostAggregate {
  const counts: AggregateCounts = { total: post.media.length, analyzed: 0, skipped: 0, errored: 0 };
  const statuses: MediaStatus[] = [];
  const scored: CategoryScores[] = [];

  for (const media of post.media) {
    if (media.error) {
      counts.errored++;
      continue;
    }
    if (!media.result) continue;
    if (media.result.skipped) counts.skipped++;
    else counts.analyzed++;
    statuses.push(media.result.status);
    scored.push(media.result.scores);
  }

  return {
    postId: post.postId,
    // Errored media never reach `scored`, so they add nothing to any denominator.
    categories: averageByCategory(scored),
    status: statuses.length > 0 ? worstStatus(statuses) : 'ERRORED',
    counts,
  };
}

// Every post weighs the same in the campaign mean regardless of how many media it holds.
export function aggregateJob(job: Pick<Job, 'posts'>, thresholds: Thresholds): AggregateResult {
  const posts = job.posts.map(aggregatePost);
  const categories = averageByCategory(posts.map((p) => p.categories));

  const categoryStatus: Record<string, MediaStatus> = {};
  const explanations: Record<string, string> = {};
  const present: number[] = [];
  for (const [category, score] of Object.entries(categories)) {
    if (score === null) {
      explanations[category] = NO_DATA;
      continue;
    }
    const status = classifyScore(score, thresholds);
    categoryStatus[category] = status;
    present.push(score);
    const note = REVIEW_NOTES[category];
    if (note && status !== 'SAFE') explanations[category] = note;
  }

  const scoredStatuses: MediaStatus[] = [];
  for (const post of posts) {
    if (post.status !== 'ERRORED') scoredStatuses.push(post.status);
  }

  const failures: MediaFailure[] = [];
  for (const post of job.posts) {
    for (const media of post.media) {
      if (media.error) {
        failures.push({
          postId: post.postId,
          mediaId: media.mediaId,
          reason: media.error.reason,
          message: media.error.message,
        });
      }
    }
  }

  return {
    categories,
    categoryStatus,
    explanations,
    overallScore: mean(present),
    status: scoredStatuses.length > 0 ? worstStatus(scoredStatuses) : 'ERRORED',
    counts: posts.reduce<AggregateCounts>(
      (sum, p) => ({
        total: sum.total + p.counts.total,
        analyzed: sum.analyzed + p.counts.analyzed,
        skipped: sum.skipped + p.counts.skipped,
        errored: sum.errored + p.counts.errored,
      }),
      { total: 0, analyzed: 0, skipped: 0, errored: 0 },
    ),
    posts,
    failures,
  };
}
