import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WorkItem } from '../messaging/work-item';
import { parseStorageEventKey } from '../messaging/storage-event.parser';
import { S3StorageService } from '../storage/services/s3-storage.service';
import { RecordExtractorService } from '../extraction/services/record-extractor.service';
import {
  CSV_CONTENT_TYPE,
  TabularWriterService,
} from '../extraction/services/tabular-writer.service';
import { ProcessingError } from '../shared/errors/processing.error';
import { ProcessingErrorKind } from '../shared/constants/processing-error-kind.enum';
import { ProcessingOutcome } from './interfaces/processing-outcome.interface';
import { ItemWorkspace } from './item-workspace';
import { deriveOutputKey } from './output-key';

/**
 * Service running one work item from notification to published CSV.
 *
 * @remarks
 * **Design Decision: Outcome Instead of Exceptions**
 *
 * `process` never throws; every failure is classified into a
 * ProcessingErrorKind and returned.
 *
 * Justification:
 * - A bad file can never stop the worker loop
 * - The loop settles the message from the outcome alone
 *
 * **Design Decision: Upload Before Acknowledge**
 *
 * The CSV is published before the message is settled, so a crash in
 * between leads to a redelivery that overwrites the same output key.
 */
@Injectable()
export class FileProcessingService {
  private readonly logger = new Logger(FileProcessingService.name);
  private readonly inputBucket: string;
  private readonly outputBucket: string;

  constructor(
    private configService: ConfigService,
    private storageService: S3StorageService,
    private recordExtractorService: RecordExtractorService,
    private tabularWriterService: TabularWriterService,
  ) {
    this.inputBucket = this.configService.getOrThrow<string>('S3_INPUT_BUCKET');
    this.outputBucket = this.configService.getOrThrow<string>('S3_OUTPUT_BUCKET');
  }

  /**
   * Download, transform and publish the file a work item refers to.
   */
  async process(item: WorkItem): Promise<ProcessingOutcome> {
    const startTime = Date.now();
    const workspace = new ItemWorkspace();

    try {
      // 1. Resolve the input key from the notification
      const inputKey = parseStorageEventKey(item.body);
      this.logger.log(
        `Processing message ${item.messageId} (receive #${item.receiveCount}): ${inputKey}`,
      );

      // 2. Download the bundle
      workspace.input = await this.fetchInput(inputKey);

      // 3. Parse it
      const document = this.parseBundle(workspace.input, inputKey);

      // 4. Extract patient rows
      const rows = this.recordExtractorService.extract(document, inputKey);

      // 5. Serialize as CSV
      workspace.output = this.tabularWriterService.write(rows);

      // 6. Publish the extract
      const outputKey = deriveOutputKey(inputKey);
      await this.storageService.publish(
        workspace.output,
        this.outputBucket,
        outputKey,
        CSV_CONTENT_TYPE,
      );

      const durationMs = Date.now() - startTime;
      this.logger.log(
        `Published ${rows.length} rows to ${this.outputBucket}/${outputKey} in ${durationMs}ms`,
      );

      return {
        status: 'success',
        inputKey,
        outputKey,
        rowCount: rows.length,
        durationMs,
      };
    } catch (error) {
      const failure = ProcessingError.from(
        error,
        ProcessingErrorKind.UNKNOWN,
        'Unexpected processing failure',
      );
      this.logger.error(
        `Failed to process message ${item.messageId} ` +
          `[${failure.kind}, ${failure.retryable ? 'retryable' : 'not retryable'}, ` +
          `receive #${item.receiveCount}]: ${failure.message}`,
      );

      return {
        status: 'failure',
        kind: failure.kind,
        reason: failure.message,
        retryable: failure.retryable,
        durationMs: Date.now() - startTime,
      };
    } finally {
      // 7. Release transient state, whatever the outcome
      const released = workspace.release();
      this.logger.debug(`Released ${released} bytes for message ${item.messageId}`);
    }
  }

  private async fetchInput(inputKey: string): Promise<Buffer> {
    try {
      return await this.storageService.fetch(this.inputBucket, inputKey);
    } catch (error) {
      throw ProcessingError.from(
        error,
        ProcessingErrorKind.FETCH_ERROR,
        `Could not fetch ${this.inputBucket}/${inputKey}`,
      );
    }
  }

  private parseBundle(input: Buffer, inputKey: string): unknown {
    try {
      return JSON.parse(input.toString('utf-8').replace(/^\uFEFF/, ''));
    } catch (error) {
      throw ProcessingError.from(
        error,
        ProcessingErrorKind.MALFORMED_BUNDLE,
        `Bundle ${inputKey} is not valid JSON`,
      );
    }
  }
}
