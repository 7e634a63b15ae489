import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'node:timers/promises';
import { QueueService } from '../messaging/queue.service';
import { WorkItem } from '../messaging/work-item';
import { FileProcessingService } from './file-processing.service';
import { ProcessingOutcome } from './interfaces/processing-outcome.interface';

/**
 * Counts for one receive-and-process iteration.
 */
export interface PollSummary {
  received: number;
  succeeded: number;
  failed: number;
}

/**
 * Service driving the receive → process → settle loop.
 *
 * @remarks
 * **Design Decision: Long Polling Instead of an Interval**
 *
 * The loop polls again as soon as a batch is settled; the queue's
 * long-poll wait is the only throttle.
 *
 * Justification:
 * - No idle gap between batches when the queue is busy
 * - An empty queue costs one request per wait period
 *
 * **Design Decision: Sequential Item Processing**
 *
 * Items of a batch are processed one at a time. Throughput scales by
 * running more worker processes against the same queue; the visibility
 * timeout keeps them from processing the same message concurrently.
 *
 * Production Consideration:
 * Exponential backoff before re-exposing failed messages.
 */
@Injectable()
export class WorkerLoopService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(WorkerLoopService.name);
  private readonly batchSize: number;
  private readonly visibilityTimeout: number;
  private readonly waitTimeSeconds: number;
  private readonly receiveErrorDelayMs: number;
  private stopRequested = false;
  private readonly abortController = new AbortController();
  private loop?: Promise<void>;

  constructor(
    private configService: ConfigService,
    private queueService: QueueService,
    private fileProcessingService: FileProcessingService,
  ) {
    this.batchSize = this.configService.get<number>('SQS_BATCH_SIZE') ?? 10;
    this.visibilityTimeout =
      this.configService.get<number>('SQS_VISIBILITY_TIMEOUT') ?? 120;
    this.waitTimeSeconds =
      this.configService.get<number>('SQS_WAIT_TIME_SECONDS') ?? 20;
    this.receiveErrorDelayMs =
      this.configService.get<number>('SQS_RECEIVE_ERROR_DELAY_MS') ?? 1000;
  }

  onApplicationBootstrap(): void {
    this.logger.log(
      `Worker starting: batch ${this.batchSize}, wait ${this.waitTimeSeconds}s, ` +
        `visibility ${this.visibilityTimeout}s`,
    );
    this.loop = this.run().catch((error: unknown) => {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Worker loop stopped unexpectedly: ${message}`);
    });
  }

  /**
   * Cancel a pending receive, let items already received finish, then
   * return.
   */
  async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(`Shutting down worker${signal ? ` (${signal})` : ''}`);
    this.stop();
    await this.loop;
  }

  /**
   * Ask the loop to exit after the iteration in progress. A long poll
   * still waiting for messages is aborted.
   */
  stop(): void {
    this.stopRequested = true;
    this.abortController.abort();
  }

  /**
   * Poll until `stop` is called.
   */
  async run(): Promise<void> {
    while (!this.stopRequested) {
      try {
        await this.pollOnce();
      } catch (error) {
        if (this.stopRequested) {
          break;
        }
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Queue polling failed: ${message}`);
        await sleep(this.receiveErrorDelayMs);
      }
    }
    this.logger.log('Worker loop stopped');
  }

  /**
   * Receive one batch and settle every item in it.
   *
   * @throws Error only when the receive call itself fails
   */
  async pollOnce(): Promise<PollSummary> {
    const items = await this.queueService.receive(
      this.batchSize,
      this.visibilityTimeout,
      this.waitTimeSeconds,
      this.abortController.signal,
    );
    const summary: PollSummary = { received: items.length, succeeded: 0, failed: 0 };

    for (const item of items) {
      const outcome = await this.fileProcessingService.process(item);
      await this.settle(item, outcome);

      if (outcome.status === 'success') {
        summary.succeeded++;
      } else {
        summary.failed++;
      }
    }

    if (items.length > 0) {
      this.logger.log(
        `Batch done: ${summary.succeeded} succeeded, ${summary.failed} failed`,
      );
    }

    return summary;
  }

  /**
   * Delete the message on success, otherwise make it visible again.
   */
  private async settle(item: WorkItem, outcome: ProcessingOutcome): Promise<void> {
    try {
      if (outcome.status === 'success') {
        await item.acknowledge();
      } else {
        await item.requeue();
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Failed to ${outcome.status === 'success' ? 'acknowledge' : 'requeue'} ` +
          `message ${item.messageId}: ${message}`,
      );
    }
  }
}
