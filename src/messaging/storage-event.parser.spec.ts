import { decodeObjectKey, parseStorageEventKey } from './storage-event.parser';
import { ProcessingError } from '../shared/errors/processing.error';
import { ProcessingErrorKind } from '../shared/constants/processing-error-kind.enum';

describe('parseStorageEventKey', () => {
  const notification = (key: unknown) =>
    JSON.stringify({
      Records: [
        {
          eventSource: 'aws:s3',
          eventName: 'ObjectCreated:Put',
          s3: { bucket: { name: 'patient-bundles' }, object: { key, size: 512 } },
        },
      ],
    });

  const parseError = (body: string): ProcessingError => {
    try {
      parseStorageEventKey(body);
    } catch (error) {
      if (error instanceof ProcessingError) {
        return error;
      }
      throw error;
    }
    throw new Error('Expected parseStorageEventKey to throw');
  };

  it('should return the object key of the first record', () => {
    expect(parseStorageEventKey(notification('bundles/patients-01.json'))).toBe(
      'bundles/patients-01.json',
    );
  });

  it('should ignore records after the first', () => {
    const body = JSON.stringify({
      Records: [
        { s3: { object: { key: 'first.json' } } },
        { s3: { object: { key: 'second.json' } } },
      ],
    });

    expect(parseStorageEventKey(body)).toBe('first.json');
  });

  it('should decode form-encoded keys', () => {
    expect(parseStorageEventKey(notification('incoming/my+bundle%281%29.json'))).toBe(
      'incoming/my bundle(1).json',
    );
  });

  it('should reject bodies that are not JSON', () => {
    const error = parseError('not json');

    expect(error.kind).toBe(ProcessingErrorKind.BAD_NOTIFICATION);
    expect(error.message).toBe('Message body is not valid JSON');
  });

  it('should reject JSON that is not an object', () => {
    expect(parseError('[1, 2]').message).toBe('Message body is not a JSON object');
    expect(parseError('null').message).toBe('Message body is not a JSON object');
  });

  it('should reject notifications without records', () => {
    expect(parseError('{}').message).toBe(
      'Message body is not a storage event: Records',
    );
    expect(parseError('{"Records": []}').kind).toBe(
      ProcessingErrorKind.BAD_NOTIFICATION,
    );
  });

  it('should reject records without an object key', () => {
    expect(parseError('{"Records": [{"s3": {}}]}').kind).toBe(
      ProcessingErrorKind.BAD_NOTIFICATION,
    );
    expect(parseError(notification('')).kind).toBe(
      ProcessingErrorKind.BAD_NOTIFICATION,
    );
    expect(parseError(notification(42)).kind).toBe(
      ProcessingErrorKind.BAD_NOTIFICATION,
    );
  });

  it('should reject keys with broken percent-encoding', () => {
    const error = parseError(notification('bundle%E0%A4%A.json'));

    expect(error.kind).toBe(ProcessingErrorKind.BAD_NOTIFICATION);
    expect(error.message).toMatch(/^Object key bundle%E0%A4%A\.json is not decodable: /);
  });
});

describe('decodeObjectKey', () => {
  it('should keep encoded plus signs', () => {
    expect(decodeObjectKey('a%2Bb+c')).toBe('a+b c');
  });
});
