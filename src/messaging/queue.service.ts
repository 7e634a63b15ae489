import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ChangeMessageVisibilityCommand,
  DeleteMessageCommand,
  GetQueueAttributesCommand,
  GetQueueUrlCommand,
  Message,
  ReceiveMessageCommand,
  SQSClient,
} from '@aws-sdk/client-sqs';
import { WorkItem, WorkItemSettler } from './work-item';

/**
 * Service for consuming storage-event notifications from SQS.
 *
 * @remarks
 * **Design Decision: Queue Validation on Startup**
 *
 * Resolves and validates the queue during module initialization.
 *
 * Justification:
 * - Fail-fast approach catches configuration errors before the first poll
 * - Logs the dead-letter threshold so operators know how many times a
 *   bad file is retried
 *
 * **Design Decision: No Retry Logic in Service**
 *
 * Failed items are made visible again and nothing else; retry limits
 * belong to the queue's redrive policy.
 *
 * Production Consideration:
 * Route non-retryable failures straight to the dead-letter queue instead
 * of waiting for the receive count to run out.
 */
@Injectable()
export class QueueService implements OnModuleInit, WorkItemSettler {
  private readonly logger = new Logger(QueueService.name);
  private sqsClient: SQSClient;
  private queueUrl?: string;

  constructor(private configService: ConfigService) {
    const accessKeyId = this.configService.get<string>('AWS_ACCESS_KEY_ID');
    const secretAccessKey = this.configService.get<string>(
      'AWS_SECRET_ACCESS_KEY',
    );

    this.sqsClient = new SQSClient({
      region: this.configService.get<string>('AWS_REGION'),
      endpoint: this.configService.get<string>('SQS_ENDPOINT'),
      credentials:
        accessKeyId && secretAccessKey
          ? { accessKeyId, secretAccessKey }
          : undefined,
    });
  }

  /**
   * Resolve the queue URL and validate the queue is reachable.
   *
   * @throws Error if the queue cannot be resolved or accessed
   */
  async onModuleInit(): Promise<void> {
    this.queueUrl = await this.resolveQueueUrl();
    await this.validateQueue(this.queueUrl);
  }

  /**
   * Receive up to `maxItems` messages, waiting at most `waitTimeSeconds`
   * for the first one to arrive.
   *
   * @param visibilityTimeout - Seconds the received messages stay hidden
   *   from other consumers
   * @param abortSignal - Cancels a pending long poll
   */
  async receive(
    maxItems: number,
    visibilityTimeout: number,
    waitTimeSeconds: number,
    abortSignal?: AbortSignal,
  ): Promise<WorkItem[]> {
    const command = new ReceiveMessageCommand({
      QueueUrl: this.getQueueUrl(),
      MaxNumberOfMessages: maxItems,
      VisibilityTimeout: visibilityTimeout,
      WaitTimeSeconds: waitTimeSeconds,
      MessageSystemAttributeNames: ['ApproximateReceiveCount'],
    });

    const response = await this.sqsClient.send(command, { abortSignal });
    const items: WorkItem[] = [];

    for (const message of response.Messages ?? []) {
      const item = this.toWorkItem(message);
      if (item) {
        items.push(item);
      }
    }

    return items;
  }

  /**
   * Delete a message from the queue.
   */
  async deleteMessage(receiptHandle: string): Promise<void> {
    const command = new DeleteMessageCommand({
      QueueUrl: this.getQueueUrl(),
      ReceiptHandle: receiptHandle,
    });

    await this.sqsClient.send(command);
  }

  /**
   * Change how long a received message stays hidden; `0` makes it
   * visible immediately.
   */
  async changeVisibility(receiptHandle: string, seconds: number): Promise<void> {
    const command = new ChangeMessageVisibilityCommand({
      QueueUrl: this.getQueueUrl(),
      ReceiptHandle: receiptHandle,
      VisibilityTimeout: seconds,
    });

    await this.sqsClient.send(command);
  }

  private toWorkItem(message: Message): WorkItem | null {
    if (!message.ReceiptHandle) {
      this.logger.warn(
        `Received message ${message.MessageId ?? '<unknown>'} without receipt handle`,
      );
      return null;
    }

    const receiveCount = Number(message.Attributes?.ApproximateReceiveCount);

    return new WorkItem(
      {
        messageId: message.MessageId ?? '<unknown>',
        body: message.Body ?? '',
        receiptHandle: message.ReceiptHandle,
        receiveCount: Number.isFinite(receiveCount) ? receiveCount : 1,
      },
      this,
    );
  }

  private getQueueUrl(): string {
    if (!this.queueUrl) {
      throw new Error('SQS queue URL has not been resolved');
    }
    return this.queueUrl;
  }

  private async resolveQueueUrl(): Promise<string> {
    const configuredUrl = this.configService.get<string>('SQS_QUEUE_URL');
    if (configuredUrl) {
      return configuredUrl;
    }

    const queueName = this.configService.getOrThrow<string>('SQS_QUEUE_NAME');
    try {
      const response = await this.sqsClient.send(
        new GetQueueUrlCommand({ QueueName: queueName }),
      );
      if (!response.QueueUrl) {
        throw new Error('No queue URL returned');
      }
      return response.QueueUrl;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Queue lookup failed for ${queueName}: ${message}`);
      throw new Error(`SQS queue ${queueName} not found: ${message}`);
    }
  }

  private async validateQueue(queueUrl: string): Promise<void> {
    try {
      const command = new GetQueueAttributesCommand({
        QueueUrl: queueUrl,
        AttributeNames: ['QueueArn', 'RedrivePolicy'],
      });

      const response = await this.sqsClient.send(command);
      const maxReceiveCount = this.readMaxReceiveCount(
        response.Attributes?.RedrivePolicy,
      );

      this.logger.log(
        maxReceiveCount === null
          ? `Queue validated: ${queueUrl} (no dead-letter queue configured)`
          : `Queue validated: ${queueUrl} (dead-letter after ${maxReceiveCount} receives)`,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Queue validation failed: ${message}`);
      throw new Error(`SQS queue not accessible at ${queueUrl}: ${message}`);
    }
  }

  private readMaxReceiveCount(redrivePolicy: string | undefined): number | null {
    if (!redrivePolicy) {
      return null;
    }

    try {
      const policy: unknown = JSON.parse(redrivePolicy);
      if (typeof policy === 'object' && policy !== null && 'maxReceiveCount' in policy) {
        const count = Number(policy.maxReceiveCount);
        return Number.isFinite(count) ? count : null;
      }
    } catch {
      this.logger.warn(`Ignoring unreadable redrive policy: ${redrivePolicy}`);
    }
    return null;
  }
}
