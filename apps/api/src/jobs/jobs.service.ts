import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { AggregateResult, aggregateJob } from '../aggregation/aggregate';
import { withTimeout } from '../common/async';
import { DispatchFailureError, NotFoundError, VersionConflictError, errorMessage } from '../common/errors';
import { ANALYSIS_CONFIG, AnalysisConfig } from '../config/analysis.config';
import { MediaWorker } from '../moderation/media-worker';
import { WorkQueue } from '../queue/work-queue';
import { SummaryClient, SummaryFailure } from '../summary/summary.client';
import {
  assertTransition,
  failureMessage,
  findMedia,
  isTerminal,
  resetForReprocess,
  resolveTerminalStatus,
  withOutcome,
} from './job-state';
import {
  Job,
  JobSnapshot,
  JobStatus,
  MediaOutcome,
  WorkUnit,
  allMedia,
  isResolved,
  toSnapshot,
} from './jobs.types';
import { JobRepository } from './repositories/job.repository';
import { parseSubmission } from './submission';

@Injectable()
export class JobsService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(JobsService.name);

  constructor(
    private readonly jobRepo: JobRepository,
    private readonly queue: WorkQueue,
    private readonly worker: MediaWorker,
    @Inject(SummaryClient) private readonly summaryClient: SummaryClient | null,
    @Inject(ANALYSIS_CONFIG) private readonly config: AnalysisConfig,
  ) {}

  onModuleInit(): void {
    this.queue.start((unit) => this.handleWorkUnit(unit));
  }

  async onModuleDestroy(): Promise<void> {
    await this.queue.stop();
  }

  async submit(body: unknown): Promise<{ jobId: string; status: JobStatus }> {
    const request = parseSubmission(body);
    const now = new Date();

    const job = await this.jobRepo.create({
      id: uuidv4(),
      campaignId: request.campaignId,
      creatorId: request.creatorId,
      status: 'PENDING',
      posts: request.posts.map((post) => ({
        postId: post.postId,
        media: post.media.map((media) => ({ ...media, result: null, error: null })),
      })),
      aggregate: null,
      summary: null,
      error: null,
      version: 0,
      generation: 0,
      createdAt: now,
      updatedAt: now,
    });
    this.logger.log(
      `Created job ${job.id} for campaign ${job.campaignId} (${allMedia(job).length} media in ${job.posts.length} posts)`,
    );

    const dispatched = await this.dispatch(job);
    return { jobId: job.id, status: dispatched.status };
  }

  async getStatus(jobId: string): Promise<JobSnapshot> {
    return toSnapshot(await this.jobRepo.get(jobId));
  }

  // A job that is still actively processing is returned unchanged.
  async reprocess(jobId: string): Promise<JobSnapshot> {
    const reset = await this.transition(jobId, (current) =>
      this.isReprocessable(current) ? resetForReprocess(current) : null,
    );
    if (!reset) {
      this.logger.log(`Job ${jobId} is still processing; reprocess ignored`);
      return this.getStatus(jobId);
    }

    this.logger.log(`Reprocessing job ${jobId} (generation ${reset.generation})`);
    await this.dispatch(reset);
    return toSnapshot(reset);
  }

  async handleWorkUnit(unit: WorkUnit): Promise<void> {
    let job: Job;
    try {
      job = await this.jobRepo.get(unit.jobId);
    } catch (err) {
      if (err instanceof NotFoundError) {
        this.logger.warn(`Dropping work unit for unknown job ${unit.jobId}`);
        return;
      }
      throw err;
    }

    if (this.awaitsFinalization(job, unit)) {
      // A previous delivery recorded the last outcome but its final write failed.
      this.logger.warn(`Job ${job.id} has every media resolved; finalizing from redelivered unit`);
      await this.finalize(job);
      return;
    }

    const media = findMedia(job, unit);
    if (!media || !this.accepts(job, unit)) {
      this.logger.debug(`Ignoring stale or duplicate unit ${unit.jobId}/${unit.postId}/${unit.mediaId}`);
      return;
    }

    const outcome = await this.worker.process(media);
    await this.recordOutcome(unit, outcome);
  }

  private accepts(job: Job, unit: WorkUnit): boolean {
    if (job.status !== 'IN_PROGRESS' || job.generation !== unit.generation) return false;
    const media = findMedia(job, unit);
    return media !== undefined && !isResolved(media);
  }

  private awaitsFinalization(job: Job, unit: WorkUnit): boolean {
    return (
      job.status === 'IN_PROGRESS' &&
      job.generation === unit.generation &&
      allMedia(job).every(({ media }) => isResolved(media))
    );
  }

  private isReprocessable(job: Job): boolean {
    if (isTerminal(job.status)) return true;
    return Date.now() - job.updatedAt.getTime() >= this.config.staleAfterMs;
  }

  private async dispatch(job: Job): Promise<Job> {
    const started = await this.transition(job.id, (current) =>
      current.status === 'PENDING' && current.generation === job.generation
        ? { ...current, status: 'IN_PROGRESS' }
        : null,
    );
    if (!started) return this.jobRepo.get(job.id);

    const units: WorkUnit[] = allMedia(started).map(({ post, media }) => ({
      jobId: started.id,
      generation: started.generation,
      postId: post.postId,
      mediaId: media.mediaId,
    }));

    const failed: Array<{ unit: WorkUnit; message: string }> = [];
    for (const unit of units) {
      try {
        await this.queue.publish(unit);
      } catch (err) {
        failed.push({ unit, message: errorMessage(err) });
      }
    }

    if (failed.length === 0) {
      this.logger.log(`Dispatched ${units.length} work unit(s) for job ${started.id}`);
      return started;
    }

    this.logger.error(`Failed to dispatch ${failed.length}/${units.length} unit(s) for job ${started.id}`);
    // Undispatched media resolve as errors so the completion count still converges.
    for (const { unit, message } of failed) {
      await this.recordOutcome(unit, {
        kind: 'error',
        error: { reason: 'DISPATCH_FAILED', message, attempts: 0 },
      });
    }
    if (failed.length === units.length) {
      throw new DispatchFailureError(started.id, failed[0].message);
    }
    return this.jobRepo.get(started.id);
  }

  private async recordOutcome(unit: WorkUnit, outcome: MediaOutcome): Promise<void> {
    const updated = await this.transition(unit.jobId, (current) =>
      this.accepts(current, unit) ? withOutcome(current, unit, outcome) : null,
    );
    if (!updated) {
      this.logger.debug(`Outcome for ${unit.jobId}/${unit.mediaId} already recorded`);
      return;
    }
    // Only the write that resolved the last media sees every media resolved.
    if (allMedia(updated).every(({ media }) => isResolved(media))) {
      await this.finalize(updated);
    }
  }

  private async finalize(job: Job): Promise<void> {
    const aggregate = aggregateJob(job, this.config.thresholds);
    const status = resolveTerminalStatus(aggregate);
    const error = status === 'FAILED' ? failureMessage(aggregate) : null;
    const summary = await this.summarize(job.id, aggregate);

    const done = await this.transition(job.id, (current) =>
      current.status === 'IN_PROGRESS' && current.generation === job.generation
        ? { ...current, status, aggregate, summary, error }
        : null,
    );
    if (done) {
      const { analyzed, skipped, errored } = aggregate.counts;
      this.logger.log(
        `Job ${job.id} finished ${status} (analyzed=${analyzed} skipped=${skipped} errored=${errored})`,
      );
    }
  }

  private async summarize(jobId: string, aggregate: AggregateResult): Promise<string | null> {
    if (!this.summaryClient) return null;
    if (aggregate.counts.analyzed + aggregate.counts.skipped === 0) return null;

    const timeoutMs = this.config.summaryTimeoutMs;
    try {
      return await withTimeout(
        this.summaryClient.summarize(aggregate),
        timeoutMs,
        () => new SummaryFailure(`Summary timed out after ${timeoutMs}ms`),
      );
    } catch (err) {
      this.logger.warn(`Summary for job ${jobId} unavailable: ${errorMessage(err)}`);
      return null;
    }
  }

  // Each version conflict means another write landed, so re-read and decide again.
  private async transition(jobId: string, decide: (current: Job) => Job | null): Promise<Job | null> {
    for (let attempt = 1; ; attempt++) {
      const current = await this.jobRepo.get(jobId);
      const next = decide(current);
      if (!next) return null;
      if (next.status !== current.status) assertTransition(current.status, next.status);

      try {
        return await this.jobRepo.conditionalUpdate(jobId, current.version, () => next);
      } catch (err) {
        if (!(err instanceof VersionConflictError)) throw err;
        this.logger.debug(`Version conflict on job ${jobId} (attempt ${attempt}), retrying`);
      }
    }
  }
}
