import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';

export class ValidationError extends BadRequestException {
  constructor(readonly problems: string[]) {
    super({ message: 'Invalid content analysis request', problems });
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends NotFoundException {
  constructor(readonly jobId: string) {
    super({ message: `Job ${jobId} not found` });
    this.name = 'NotFoundError';
  }
}

/** Raised when a conditional write observes a newer record version. */
export class VersionConflictError extends ConflictException {
  constructor(
    readonly jobId: string,
    readonly expectedVersion: number,
    readonly actualVersion: number,
  ) {
    super({
      message: `Job ${jobId} was modified concurrently (expected version ${expectedVersion}, found ${actualVersion})`,
    });
    this.name = 'VersionConflictError';
  }
}

export class DispatchFailureError extends ServiceUnavailableException {
  constructor(readonly jobId: string, reason: string) {
    super({ message: `Failed to enqueue analysis job ${jobId}: ${reason}` });
    this.name = 'DispatchFailureError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal job transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
