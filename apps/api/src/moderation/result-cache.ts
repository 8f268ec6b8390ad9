import { Inject, Injectable } from '@nestjs/common';
import { ANALYSIS_CONFIG, AnalysisConfig } from '../config/analysis.config';
import type { MediaResult } from '../jobs/jobs.types';

/** Content-addressed store of previously computed media results. */
export abstract class ResultCache {
  abstract get(fingerprint: string): Promise<MediaResult | undefined>;

  /** Entries are immutable: a second put for the same fingerprint is ignored. */
  abstract put(fingerprint: string, result: MediaResult): Promise<void>;
}

@Injectable()
export class InMemoryResultCache extends ResultCache {
  private readonly entries = new Map<string, MediaResult>();
  private readonly maxEntries: number;

  constructor(@Inject(ANALYSIS_CONFIG) config: Pick<AnalysisConfig, 'cacheMaxEntries'>) {
    super();
    this.maxEntries = config.cacheMaxEntries;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(fingerprint: string): Promise<MediaResult | undefined> {
    const hit = this.entries.get(fingerprint);
    return hit ? structuredClone(hit) : undefined;
  }

  async put(fingerprint: string, result: MediaResult): Promise<void> {
    if (this.entries.has(fingerprint)) return;
    if (this.maxEntries > 0 && this.entries.size >= this.maxEntries) {
      // Map iteration order is insertion order, so the first key is the oldest.
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(fingerprint, structuredClone(result));
  }
}
