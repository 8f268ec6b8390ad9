import type { Thresholds } from '../config/analysis.config';
import type { CategoryScores } from '../jobs/jobs.types';

export type MediaStatus = 'SAFE' | 'WARNING' | 'REJECTED';

const SEVERITY: Record<MediaStatus, number> = {
  SAFE: 0,
  WARNING: 1,
  REJECTED: 2,
};

export function worstStatus(statuses: Iterable<MediaStatus>): MediaStatus {
  let worst: MediaStatus = 'SAFE';
  for (const status of statuses) {
    if (SEVERITY[status] > SEVERITY[worst]) worst = status;
  }
  return worst;
}

export function classifyScore(score: number, thresholds: Thresholds): MediaStatus {
  if (score >= thresholds.reject) return 'REJECTED';
  if (score >= thresholds.warning) return 'WARNING';
  return 'SAFE';
}

/** Worst category wins; absent scores do not count. */
export function classifyScores(scores: CategoryScores, thresholds: Thresholds): MediaStatus {
  const statuses: MediaStatus[] = [];
  for (const score of Object.values(scores)) {
    if (score !== null) statuses.push(classifyScore(score, thresholds));
  }
  return worstStatus(statuses);
}

export function invalidCategories(scores: Record<string, unknown>): string[] {
  return Object.entries(scores)
    .filter(([, value]) => {
      if (value === null) return false;
      return typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1;
    })
    .map(([category]) => category);
}

export function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return roundScore(values.reduce((a, b) => a + b, 0) / values.length);
}
