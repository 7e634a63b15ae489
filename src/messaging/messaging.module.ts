import { Module } from '@nestjs/common';
import { QueueService } from './queue.service';

/**
 * Module for SQS consumption.
 *
 * @remarks
 * Provides the QueueService, which hands out WorkItems that settle
 * themselves against the same queue.
 */
@Module({
  providers: [QueueService],
  exports: [QueueService],
})
export class MessagingModule {}
