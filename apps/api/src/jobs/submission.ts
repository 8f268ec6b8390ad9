import { ValidationError } from '../common/errors';
import { CampaignSubmission, MEDIA_TYPES, MediaType } from './jobs.types';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMediaType(value: unknown): value is MediaType {
  return MEDIA_TYPES.some((type) => type === value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isHttpUrl(value: string): boolean {
  if (!URL.canParse(value)) return false;
  const { protocol } = new URL(value);
  return protocol === 'http:' || protocol === 'https:';
}

// Collects every problem before rejecting.
export function parseSubmission(body: unknown): CampaignSubmission {
  const problems: string[] = [];
  if (!isRecord(body)) {
    throw new ValidationError(['request body must be an object']);
  }

  const { campaignId, creatorId, posts } = body;
  if (!isNonEmptyString(campaignId)) problems.push('campaignId must be a non-empty string');
  if (!isNonEmptyString(creatorId)) problems.push('creatorId must be a non-empty string');
  if (!Array.isArray(posts) || posts.length === 0) {
    problems.push('posts must contain at least one post');
    throw new ValidationError(problems);
  }

  const parsedPosts: CampaignSubmission['posts'] = [];
  const postIds = new Set<string>();

  posts.forEach((post: unknown, i: number) => {
    const at = `posts[${i}]`;
    if (!isRecord(post)) {
      problems.push(`${at} must be an object`);
      return;
    }
    const { postId, media } = post;
    if (!isNonEmptyString(postId)) {
      problems.push(`${at}.postId must be a non-empty string`);
    } else if (postIds.has(postId)) {
      problems.push(`${at}.postId "${postId}" is duplicated`);
    } else {
      postIds.add(postId);
    }
    if (!Array.isArray(media) || media.length === 0) {
      problems.push(`${at}.media must contain at least one media item`);
      return;
    }

    const mediaIds = new Set<string>();
    const parsedMedia: CampaignSubmission['posts'][number]['media'] = [];
    media.forEach((item: unknown, j: number) => {
      const mat = `${at}.media[${j}]`;
      if (!isRecord(item)) {
        problems.push(`${mat} must be an object`);
        return;
      }
      const { mediaId, type, url } = item;
      if (!isNonEmptyString(mediaId)) {
        problems.push(`${mat}.mediaId must be a non-empty string`);
      } else if (mediaIds.has(mediaId)) {
        problems.push(`${mat}.mediaId "${mediaId}" is duplicated within the post`);
      } else {
        mediaIds.add(mediaId);
      }
      if (!isMediaType(type)) {
        problems.push(`${mat}.type must be one of: ${MEDIA_TYPES.join(', ')}`);
      }
      if (typeof url !== 'string' || !isHttpUrl(url)) {
        problems.push(`${mat}.url must be an absolute http(s) URL`);
      }
      if (isNonEmptyString(mediaId) && isMediaType(type) && typeof url === 'string') {
        parsedMedia.push({ mediaId, type, url });
      }
    });

    if (isNonEmptyString(postId)) {
      parsedPosts.push({ postId, media: parsedMedia });
    }
  });

  if (problems.length > 0 || !isNonEmptyString(campaignId) || !isNonEmptyString(creatorId)) {
    throw new ValidationError(problems);
  }
  return { campaignId, creatorId, posts: parsedPosts };
}
