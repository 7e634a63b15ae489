import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';

/**
 * Object storage collaborator: whole-object download and upload by key.
 *
 * @remarks
 * **Design Decision: Buffer-Based Transfer**
 *
 * Objects are read fully into memory before they are handed on.
 *
 * Justification:
 * - Bundles are parsed as a single JSON document, so the whole body is
 *   needed before any row can be produced
 * - Nothing is staged on local disk, so there is nothing to clean up
 *   when a worker container is recycled
 *
 * Production Consideration:
 * Very large bundles need a streaming JSON parser and a size limit.
 */
@Injectable()
export class S3StorageService {
  private readonly logger = new Logger(S3StorageService.name);
  private s3Client: S3Client;

  constructor(private configService: ConfigService) {
    const endpoint = this.configService.get<string>('S3_ENDPOINT');
    const accessKeyId = this.configService.get<string>('AWS_ACCESS_KEY_ID');
    const secretAccessKey = this.configService.get<string>(
      'AWS_SECRET_ACCESS_KEY',
    );

    this.s3Client = new S3Client({
      region: this.configService.get<string>('AWS_REGION'),
      endpoint,
      credentials:
        accessKeyId && secretAccessKey
          ? { accessKeyId, secretAccessKey }
          : undefined,
      forcePathStyle: Boolean(endpoint), // Required for LocalStack compatibility
    });
  }

  /**
   * Download an object as a buffer.
   *
   * @throws Error if the object is missing, empty or unreachable
   */
  async fetch(bucket: string, key: string): Promise<Buffer> {
    const command = new GetObjectCommand({
      Bucket: bucket,
      Key: key,
    });

    try {
      const response = await this.s3Client.send(command);

      if (!response.Body) {
        throw new Error('Empty response body');
      }

      const buffer = Buffer.from(await response.Body.transformToByteArray());
      this.logger.debug(`Downloaded ${buffer.length} bytes from ${bucket}/${key}`);
      return buffer;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to download from S3: ${bucket}/${key} - ${message}`);
      throw new Error(`S3 download failed for ${bucket}/${key}: ${message}`, {
        cause: error,
      });
    }
  }

  /**
   * Upload a buffer, replacing any object already stored under the key.
   *
   * @throws Error if the upload fails
   */
  async publish(
    body: Buffer,
    bucket: string,
    key: string,
    contentType: string,
  ): Promise<void> {
    const command = new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentType: contentType,
    });

    try {
      await this.s3Client.send(command);
      this.logger.debug(`Uploaded ${body.length} bytes to ${bucket}/${key}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to upload to S3: ${bucket}/${key} - ${message}`);
      throw new Error(`S3 upload failed for ${bucket}/${key}: ${message}`, {
        cause: error,
      });
    }
  }
}
