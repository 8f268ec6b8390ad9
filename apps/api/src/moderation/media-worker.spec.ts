import { Logger } from '@nestjs/common';
import type { Media } from '../jobs/jobs.types';
import { ScriptedModerationClient, ScriptStep, testConfig } from '../testing/fakes';
import type { AnalysisConfig } from '../config/analysis.config';
import { contentFingerprint } from './fingerprint';
import { MAX_RETRY_DELAY_MS, MediaWorker, retryDelay } from './media-worker';
import { InvalidMediaError, ProviderError, ProviderTimeoutError } from './moderation.client';
import { InMemoryResultCache } from './result-cache';

function media(url: string, mediaId = 'm1'): Media {
  return { mediaId, type: 'image', url, result: null, error: null };
}

function setup(script: Record<string, ScriptStep | ScriptStep[]>, overrides: Partial<AnalysisConfig> = {}) {
  const config = testConfig(overrides);
  const client = new ScriptedModerationClient(script);
  const cache = new InMemoryResultCache(config);
  return { client, cache, worker: new MediaWorker(client, cache, config) };
}

describe('MediaWorker', () => {
  beforeAll(() => Logger.overrideLogger(false));

  it('classifies provider scores and caches the result', async () => {
    const url = 'https://cdn.test/a.jpg';
    const { worker, cache } = setup({ [url]: { nudity: 0.1, violence: 0.5, gore: null } });

    const outcome = await worker.process(media(url));

    expect(outcome).toEqual({
      kind: 'result',
      result: {
        scores: { nudity: 0.1, violence: 0.5, gore: null },
        status: 'WARNING',
        contentFingerprint: contentFingerprint({ type: 'image', url }),
        skipped: false,
        cached: false,
      },
    });
    expect(await cache.get(contentFingerprint({ type: 'image', url }))).toBeDefined();
  });

  it('reuses the cache instead of calling the provider again', async () => {
    const url = 'https://cdn.test/a.jpg';
    const { worker, client } = setup({ [url]: { nudity: 0.8 } });

    await worker.process(media(url, 'm1'));
    const second = await worker.process(media(url, 'm2'));

    expect(client.callsFor(url)).toBe(1);
    expect(second.kind === 'result' && second.result).toMatchObject({ status: 'REJECTED', cached: true });
  });

  it('shares one provider call between concurrent identical media', async () => {
    const url = 'https://cdn.test/a.jpg';
    const { worker, client } = setup({ [url]: { nudity: 0.2 } });

    const [a, b] = await Promise.all([worker.process(media(url, 'm1')), worker.process(media(url, 'm2'))]);

    expect(client.callsFor(url)).toBe(1);
    expect(a.kind).toBe('result');
    expect(b.kind).toBe('result');
  });

  it('skips known-safe fingerprints without calling the provider', async () => {
    const url = 'https://cdn.test/logo.png';
    const fingerprint = contentFingerprint({ type: 'image', url });
    const { worker, client } = setup({}, { knownSafeFingerprints: [fingerprint] });

    const outcome = await worker.process(media(url));

    expect(client.calls).toEqual([]);
    expect(outcome).toEqual({
      kind: 'result',
      result: { scores: {}, status: 'SAFE', contentFingerprint: fingerprint, skipped: true, cached: false },
    });
  });

  it('retries transient failures and succeeds', async () => {
    const url = 'https://cdn.test/a.jpg';
    const { worker, client } = setup({
      [url]: [new ProviderError('HTTP 502', 'scripted'), { violence: 0.9 }],
    });

    const outcome = await worker.process(media(url));

    expect(client.callsFor(url)).toBe(2);
    expect(outcome.kind === 'result' && outcome.result.status).toBe('REJECTED');
  });

  it('returns a MediaError once retries are exhausted', async () => {
    const url = 'https://cdn.test/a.jpg';
    const { worker, client, cache } = setup({ [url]: new ProviderError('HTTP 500', 'scripted') }, { retryLimit: 2 });

    const outcome = await worker.process(media(url));

    expect(client.callsFor(url)).toBe(3);
    expect(outcome).toEqual({
      kind: 'error',
      error: { reason: 'PROVIDER_ERROR', message: 'HTTP 500', attempts: 3 },
    });
    expect(cache.size).toBe(0);
  });

  it('treats a slow provider as a retryable timeout', async () => {
    const url = 'https://cdn.test/slow.jpg';
    const { worker, client } = setup({ [url]: 'hang' }, { moderationTimeoutMs: 5, retryLimit: 1 });

    const outcome = await worker.process(media(url));

    expect(client.callsFor(url)).toBe(2);
    expect(outcome).toEqual({
      kind: 'error',
      error: { reason: 'PROVIDER_TIMEOUT', message: 'scripted did not respond within 5ms', attempts: 2 },
    });
  });

  it('does not retry invalid media', async () => {
    const url = 'https://cdn.test/broken.jpg';
    const { worker, client } = setup({ [url]: new InvalidMediaError('unsupported format', 'scripted') });

    const outcome = await worker.process(media(url));

    expect(client.callsFor(url)).toBe(1);
    expect(outcome).toEqual({
      kind: 'error',
      error: { reason: 'INVALID_MEDIA', message: 'unsupported format', attempts: 1 },
    });
  });

  it('rejects out-of-range scores as a provider error', async () => {
    const url = 'https://cdn.test/a.jpg';
    const { worker } = setup({ [url]: { nudity: 1.7 } }, { retryLimit: 0 });

    const outcome = await worker.process(media(url));

    expect(outcome).toEqual({
      kind: 'error',
      error: { reason: 'PROVIDER_ERROR', message: 'scripted returned out-of-range scores for: nudity', attempts: 1 },
    });
  });

  it('wraps unexpected errors instead of throwing', async () => {
    const url = 'https://cdn.test/a.jpg';
    const { worker } = setup({ [url]: new TypeError('boom') }, { retryLimit: 0 });

    await expect(worker.process(media(url))).resolves.toEqual({
      kind: 'error',
      error: { reason: 'PROVIDER_ERROR', message: 'boom', attempts: 1 },
    });
  });

  it('maps timeout errors raised by the adapter', async () => {
    const url = 'https://cdn.test/a.jpg';
    const { worker } = setup({ [url]: new ProviderTimeoutError('scripted', 100) }, { retryLimit: 0 });

    const outcome = await worker.process(media(url));
    expect(outcome.kind === 'error' && outcome.error.reason).toBe('PROVIDER_TIMEOUT');
  });
});

describe('retryDelay', () => {
  it('doubles the base delay per attempt', () => {
    expect([1, 2, 3].map((attempt) => retryDelay(attempt, 250))).toEqual([250, 500, 1000]);
  });

  it('never exceeds the cap for large retry limits', () => {
    expect(retryDelay(40, 250)).toBe(MAX_RETRY_DELAY_MS);
    expect(retryDelay(2000, 250)).toBe(MAX_RETRY_DELAY_MS);
  });
});
