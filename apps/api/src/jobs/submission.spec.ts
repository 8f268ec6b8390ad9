import { ValidationError } from '../common/errors';
import { parseSubmission } from './submission';

const valid = {
  campaignId: 'cmp-1',
  creatorId: 'creator-1',
  posts: [
    {
      postId: 'p1',
      media: [
        { mediaId: 'm1', type: 'image', url: 'https://cdn.test/a.jpg' },
        { mediaId: 'm2', type: 'video', url: 'http://cdn.test/b.mp4' },
      ],
    },
  ],
};

function problemsOf(body: unknown): string[] {
  try {
    parseSubmission(body);
  } catch (err) {
    if (err instanceof ValidationError) return err.problems;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

describe('parseSubmission', () => {
  it('accepts a well-formed campaign', () => {
    expect(parseSubmission(valid)).toEqual(valid);
  });

  it('drops unknown fields', () => {
    const parsed = parseSubmission({ ...valid, extra: true });
    expect(Object.keys(parsed)).toEqual(['campaignId', 'creatorId', 'posts']);
  });

  it('rejects a non-object body', () => {
    expect(problemsOf('nope')).toEqual(['request body must be an object']);
  });

  it('rejects a campaign without posts', () => {
    expect(problemsOf({ campaignId: 'c', creatorId: 'u', posts: [] })).toEqual([
      'posts must contain at least one post',
    ]);
  });

  it('rejects a post without media', () => {
    expect(problemsOf({ ...valid, posts: [{ postId: 'p1', media: [] }] })).toEqual([
      'posts[0].media must contain at least one media item',
    ]);
  });

  it('collects every media problem', () => {
    const problems = problemsOf({
      campaignId: '',
      creatorId: 'u',
      posts: [
        {
          postId: 'p1',
          media: [
            { mediaId: 'm1', type: 'audio', url: 'ftp://cdn.test/a' },
            { mediaId: 'm1', type: 'image', url: 'https://cdn.test/b.jpg' },
          ],
        },
        { postId: 'p1', media: [{ mediaId: 'm1', type: 'image', url: 'https://cdn.test/c.jpg' }] },
      ],
    });

    expect(problems).toEqual([
      'campaignId must be a non-empty string',
      'posts[0].media[0].type must be one of: image, video',
      'posts[0].media[0].url must be an absolute http(s) URL',
      'posts[0].media[1].mediaId "m1" is duplicated within the post',
      'posts[1].postId "p1" is duplicated',
    ]);
  });
});
