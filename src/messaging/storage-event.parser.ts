import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { StorageEventNotificationDto } from './dto/storage-event-notification.dto';
import { ProcessingError } from '../shared/errors/processing.error';
import { ProcessingErrorKind } from '../shared/constants/processing-error-kind.enum';

/**
 * Decode an S3 event key: `+` stands for a space, everything else is
 * percent-encoded.
 */
export function decodeObjectKey(encodedKey: string): string {
  return decodeURIComponent(encodedKey.replace(/\+/g, ' '));
}

/**
 * Read the input object key out of a queue message body.
 *
 * Only the first record is used; S3 emits one record per notification.
 *
 * @throws ProcessingError with kind BAD_NOTIFICATION
 */
export function parseStorageEventKey(body: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    throw new ProcessingError(
      ProcessingErrorKind.BAD_NOTIFICATION,
      'Message body is not valid JSON',
    );
  }

  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new ProcessingError(
      ProcessingErrorKind.BAD_NOTIFICATION,
      'Message body is not a JSON object',
    );
  }

  const notification = plainToInstance(StorageEventNotificationDto, payload);
  const errors = validateSync(notification);
  if (errors.length > 0) {
    throw new ProcessingError(
      ProcessingErrorKind.BAD_NOTIFICATION,
      `Message body is not a storage event: ${errors
        .map((error) => error.property)
        .join(', ')}`,
    );
  }

  const encodedKey = notification.Records[0].s3.object.key;
  try {
    return decodeObjectKey(encodedKey);
  } catch (error) {
    throw ProcessingError.from(
      error,
      ProcessingErrorKind.BAD_NOTIFICATION,
      `Object key ${encodedKey} is not decodable`,
    );
  }
}
