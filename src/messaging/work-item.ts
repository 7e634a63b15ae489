/**
 * Queue operations a work item needs to settle itself.
 */
export interface WorkItemSettler {
  deleteMessage(receiptHandle: string): Promise<void>;
  changeVisibility(receiptHandle: string, seconds: number): Promise<void>;
}

export interface WorkItemProps {
  messageId: string;
  body: string;
  receiptHandle: string;
  /** Deliveries so far, including this one */
  receiveCount: number;
}

/**
 * One received storage-event notification.
 *
 * @remarks
 * A work item ends either acknowledged (deleted from the queue) or
 * requeued (visible again immediately). After enough requeues the
 * queue's redrive policy moves the message to its dead-letter queue;
 * the worker never counts attempts itself.
 */
export class WorkItem {
  readonly messageId: string;
  readonly body: string;
  readonly receiveCount: number;
  private readonly receiptHandle: string;

  constructor(
    props: WorkItemProps,
    private readonly settler: WorkItemSettler,
  ) {
    this.messageId = props.messageId;
    this.body = props.body;
    this.receiveCount = props.receiveCount;
    this.receiptHandle = props.receiptHandle;
  }

  /** Permanently remove the message from the queue. */
  async acknowledge(): Promise<void> {
    await this.settler.deleteMessage(this.receiptHandle);
  }

  async setVisibility(seconds: number): Promise<void> {
    await this.settler.changeVisibility(this.receiptHandle, seconds);
  }

  /** Make the message eligible for redelivery right away. */
  async requeue(): Promise<void> {
    await this.setVisibility(0);
  }
}
