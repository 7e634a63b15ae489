import { Module } from '@nestjs/common';
import { MessagingModule } from '../messaging/messaging.module';
import { StorageModule } from '../storage/storage.module';
import { ExtractionModule } from '../extraction/extraction.module';
import { FileProcessingService } from './file-processing.service';
import { WorkerLoopService } from './worker-loop.service';

/**
 * Module wiring the queue, storage and extraction into the worker loop.
 *
 * The loop starts on application bootstrap and stops on shutdown.
 */
@Module({
  imports: [MessagingModule, StorageModule, ExtractionModule],
  providers: [FileProcessingService, WorkerLoopService],
  exports: [FileProcessingService, WorkerLoopService],
})
export class ProcessingModule {}
