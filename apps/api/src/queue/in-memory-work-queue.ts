import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { ANALYSIS_CONFIG, AnalysisConfig } from '../config/analysis.config';
import type { WorkUnit } from '../jobs/jobs.types';
import { WorkHandler, WorkQueue } from './work-queue';

interface Delivery {
  unit: WorkUnit;
  attempt: number;
}

@Injectable()
export class InMemoryWorkQueue extends WorkQueue {
  private readonly logger = new Logger(InMemoryWorkQueue.name);
  private readonly pending: Delivery[] = [];
  private readonly concurrency: number;
  private readonly maxDeliveries: number;
  private handler: WorkHandler | null = null;
  private active = 0;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    @Inject(ANALYSIS_CONFIG) config: Pick<AnalysisConfig, 'workerConcurrency' | 'maxDeliveries'>,
  ) {
    super();
    this.concurrency = config.workerConcurrency;
    this.maxDeliveries = config.maxDeliveries;
  }

  get size(): number {
    return this.pending.length + this.active;
  }

  start(handler: WorkHandler): void {
    if (this.stopped) throw new Error('Queue has been stopped');
    this.handler = handler;
    this.schedule();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.active > 0) {
      await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
    }
    if (this.pending.length > 0) {
      this.logger.warn(`Queue stopped with ${this.pending.length} undelivered unit(s)`);
    }
  }

  async publish(unit: WorkUnit): Promise<void> {
    if (this.stopped) throw new Error('Queue has been stopped');
    this.pending.push({ unit, attempt: 1 });
    this.schedule();
  }

  onIdle(): Promise<void> {
    if (this.size === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private schedule(): void {
    // Deliver on a later tick so publish() never runs the handler inline.
    setImmediate(() => this.pump());
  }

  private pump(): void {
    const handler = this.handler;
    if (!handler) return;
    while (!this.stopped && this.active < this.concurrency && this.pending.length > 0) {
      const delivery = this.pending.shift();
      if (!delivery) break;
      this.active++;
      void this.deliver(handler, delivery);
    }
    this.notifyIdle();
  }

  private async deliver(handler: WorkHandler, delivery: Delivery): Promise<void> {
    const { unit, attempt } = delivery;
    try {
      await handler(unit);
    } catch (err) {
      if (attempt < this.maxDeliveries && !this.stopped) {
        this.logger.warn(
          `Delivery ${attempt}/${this.maxDeliveries} of ${unit.jobId}/${unit.mediaId} failed: ${errorMessage(err)}`,
        );
        this.pending.push({ unit, attempt: attempt + 1 });
      } else {
        this.logger.error(
          `Dead-lettered ${unit.jobId}/${unit.mediaId} after ${attempt} deliveries: ${errorMessage(err)}`,
        );
      }
    } finally {
      this.active--;
      this.pump();
    }
  }

  private notifyIdle(): void {
    const idle = this.active === 0 && (this.pending.length === 0 || this.stopped);
    if (!idle || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
