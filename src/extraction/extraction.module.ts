import { Module } from '@nestjs/common';
import { RecordExtractorService } from './services/record-extractor.service';
import { TabularWriterService } from './services/tabular-writer.service';

/**
 * Extraction module for turning patient bundles into CSV.
 *
 * @remarks
 * This module provides:
 * - Row extraction from parsed bundles via RecordExtractorService
 * - CSV serialization via TabularWriterService
 *
 * Neither service performs I/O.
 */
@Module({
  providers: [RecordExtractorService, TabularWriterService],
  exports: [RecordExtractorService, TabularWriterService],
})
export class ExtractionModule {}
