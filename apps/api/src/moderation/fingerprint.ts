import { createHash } from 'crypto';
import type { MediaRef } from '../jobs/jobs.types';

function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!URL.canParse(trimmed)) return trimmed;
  const url = new URL(trimmed);
  url.hash = '';
  return url.toString();
}

export function contentFingerprint(media: MediaRef): string {
  return createHash('sha256').update(`${media.type}\n${normalizeUrl(media.url)}`).digest('hex');
}
