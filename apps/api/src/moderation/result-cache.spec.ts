import type { MediaResult } from '../jobs/jobs.types';
import { InMemoryResultCache } from './result-cache';

function result(fingerprint: string, nudity: number): MediaResult {
  return { scores: { nudity }, status: 'SAFE', contentFingerprint: fingerprint, skipped: false, cached: false };
}

describe('InMemoryResultCache', () => {
  it('returns undefined on a miss and a copy on a hit', async () => {
    const cache = new InMemoryResultCache({ cacheMaxEntries: 0 });
    expect(await cache.get('fp-1')).toBeUndefined();

    await cache.put('fp-1', result('fp-1', 0.1));
    const hit = await cache.get('fp-1');
    expect(hit).toEqual(result('fp-1', 0.1));

    if (hit) hit.scores.nudity = 0.9;
    expect((await cache.get('fp-1'))?.scores.nudity).toBe(0.1);
  });

  it('never overwrites an existing entry', async () => {
    const cache = new InMemoryResultCache({ cacheMaxEntries: 0 });
    await cache.put('fp-1', result('fp-1', 0.1));
    await cache.put('fp-1', result('fp-1', 0.8));
    expect((await cache.get('fp-1'))?.scores.nudity).toBe(0.1);
  });

  it('evicts the oldest entry when bounded', async () => {
    const cache = new InMemoryResultCache({ cacheMaxEntries: 2 });
    await cache.put('a', result('a', 0.1));
    await cache.put('b', result('b', 0.1));
    await cache.put('c', result('c', 0.1));

    expect(cache.size).toBe(2);
    expect(await cache.get('a')).toBeUndefined();
    expect(await cache.get('b')).toBeDefined();
    expect(await cache.get('c')).toBeDefined();
  });
});
