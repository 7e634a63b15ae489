import { Module } from '@nestjs/common';
import { S3StorageService } from './services/s3-storage.service';

/**
 * Module for S3 object download and upload.
 */
@Module({
  providers: [S3StorageService],
  exports: [S3StorageService],
})
export class StorageModule {}
