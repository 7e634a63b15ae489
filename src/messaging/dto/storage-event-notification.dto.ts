import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsDefined,
  IsNotEmpty,
  IsString,
  ValidateNested,
} from 'class-validator';

/**
 * Object reference inside an S3 event record.
 *
 * The key arrives form-encoded (spaces as `+`, other characters
 * percent-encoded).
 */
export class StorageObjectDto {
  @IsString()
  @IsNotEmpty()
  key!: string;
}

export class StorageEntityDto {
  @IsDefined()
  @ValidateNested()
  @Type(() => StorageObjectDto)
  object!: StorageObjectDto;
}

export class StorageEventRecordDto {
  @IsDefined()
  @ValidateNested()
  @Type(() => StorageEntityDto)
  s3!: StorageEntityDto;
}

/**
 * S3 event notification as delivered to the queue.
 *
 * Only the fields the worker reads are declared; the rest of the payload
 * is ignored.
 */
export class StorageEventNotificationDto {
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => StorageEventRecordDto)
  Records!: StorageEventRecordDto[];
}
