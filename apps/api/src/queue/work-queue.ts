import type { WorkUnit } from '../jobs/jobs.types';

export type WorkHandler = (unit: WorkUnit) => Promise<void>;

/** At-least-once: a unit may reach the handler more than once. */
export abstract class WorkQueue {
  abstract start(handler: WorkHandler): void;

  abstract stop(): Promise<void>;

  /** Resolves once the unit is accepted for delivery. */
  abstract publish(unit: WorkUnit): Promise<void>;
}
