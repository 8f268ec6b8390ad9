import { Module } from '@nestjs/common';
import { InMemoryWorkQueue } from './in-memory-work-queue';
import { WorkQueue } from './work-queue';

@Module({
  providers: [{ provide: WorkQueue, useClass: InMemoryWorkQueue }],
  exports: [WorkQueue],
})
export class QueueModule {}
