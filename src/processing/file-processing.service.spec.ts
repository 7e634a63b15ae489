import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { FileProcessingService } from './file-processing.service';
import { S3StorageService } from '../storage/services/s3-storage.service';
import { RecordExtractorService } from '../extraction/services/record-extractor.service';
import { TabularWriterService } from '../extraction/services/tabular-writer.service';
import { WorkItem, WorkItemSettler } from '../messaging/work-item';
import { ProcessingErrorKind } from '../shared/constants/processing-error-kind.enum';
import { ProcessingOutcome } from './interfaces/processing-outcome.interface';

describe('FileProcessingService', () => {
  let service: FileProcessingService;
  let tabularWriterService: TabularWriterService;

  const mockStorageService = {
    fetch: jest.fn(),
    publish: jest.fn(),
  };

  const mockConfigService = {
    getOrThrow: jest.fn((key: string) => {
      const config: Record<string, string> = {
        S3_INPUT_BUCKET: 'patient-bundles',
        S3_OUTPUT_BUCKET: 'patient-extracts',
      };
      return config[key];
    }),
  };

  const settler: WorkItemSettler = {
    deleteMessage: jest.fn(),
    changeVisibility: jest.fn(),
  };

  const workItem = (body: string) =>
    new WorkItem(
      { messageId: 'msg-1', body, receiptHandle: 'handle-1', receiveCount: 1 },
      settler,
    );

  const notification = (key: string) =>
    JSON.stringify({ Records: [{ s3: { object: { key } } }] });

  const patientBundle = JSON.stringify({
    entry: [
      {
        fullUrl: 'u1',
        resource: {
          resourceType: 'Patient',
          id: 'p1',
          active: true,
          gender: 'female',
          name: [{ given: ['Ann'], family: ['Lee'] }],
          telecom: [{ value: '555-1234' }],
          address: [{ value: '1 Main St' }],
        },
      },
    ],
  });

  const expectFailure = (
    outcome: ProcessingOutcome,
    kind: ProcessingErrorKind,
  ): void => {
    expect(outcome.status).toBe('failure');
    if (outcome.status === 'failure') {
      expect(outcome.kind).toBe(kind);
    }
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockStorageService.publish.mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FileProcessingService,
        RecordExtractorService,
        TabularWriterService,
        { provide: S3StorageService, useValue: mockStorageService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    module.useLogger(false);
    service = module.get<FileProcessingService>(FileProcessingService);
    tabularWriterService = module.get<TabularWriterService>(TabularWriterService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('process', () => {
    it('should download, transform and publish the bundle', async () => {
      mockStorageService.fetch.mockResolvedValue(Buffer.from(patientBundle));

      const outcome = await service.process(
        workItem(notification('incoming/ward+7/bundle-01.json')),
      );

      expect(outcome).toMatchObject({
        status: 'success',
        inputKey: 'incoming/ward 7/bundle-01.json',
        outputKey: 'bundle-01.csv',
        rowCount: 1,
      });
      expect(mockStorageService.fetch).toHaveBeenCalledWith(
        'patient-bundles',
        'incoming/ward 7/bundle-01.json',
      );

      expect(mockStorageService.publish).toHaveBeenCalledTimes(1);
      const [body, bucket, key, contentType] = mockStorageService.publish.mock.calls[0];
      expect(bucket).toBe('patient-extracts');
      expect(key).toBe('bundle-01.csv');
      expect(contentType).toBe('text/csv; charset=utf-8');
      expect(body.toString('utf-8')).toBe(
        'url,resource_id,last_updated,status,system_id,active,first_name,last_name,phone,gender,address\r\n' +
          "u1,p1,,,,True,Ann,['Lee'],555-1234,female,1 Main St\r\n",
      );
    });

    it('should ignore a byte order mark before the JSON', async () => {
      mockStorageService.fetch.mockResolvedValue(Buffer.from(`\uFEFF${patientBundle}`));

      const outcome = await service.process(workItem(notification('bundle.json')));

      expect(outcome.status).toBe('success');
    });

    it('should fail with BAD_NOTIFICATION for an unusable message body', async () => {
      const outcome = await service.process(workItem('{"hello":"world"}'));

      expectFailure(outcome, ProcessingErrorKind.BAD_NOTIFICATION);
      expect(mockStorageService.fetch).not.toHaveBeenCalled();
    });

    it('should fail with FETCH_ERROR when the download fails', async () => {
      mockStorageService.fetch.mockRejectedValue(
        new Error('S3 download failed for patient-bundles/bundle.json: NoSuchKey'),
      );

      const outcome = await service.process(workItem(notification('bundle.json')));

      expect(outcome).toMatchObject({
        status: 'failure',
        kind: ProcessingErrorKind.FETCH_ERROR,
        retryable: true,
        reason:
          'Could not fetch patient-bundles/bundle.json: ' +
          'S3 download failed for patient-bundles/bundle.json: NoSuchKey',
      });
      expect(mockStorageService.publish).not.toHaveBeenCalled();
    });

    it('should fail with MALFORMED_BUNDLE when the file is not JSON', async () => {
      mockStorageService.fetch.mockResolvedValue(Buffer.from('<Bundle/>'));

      const outcome = await service.process(workItem(notification('bundle.json')));

      expect(outcome).toMatchObject({
        status: 'failure',
        kind: ProcessingErrorKind.MALFORMED_BUNDLE,
        retryable: false,
      });
      expect(mockStorageService.publish).not.toHaveBeenCalled();
    });

    it('should fail with MALFORMED_BUNDLE when the entry list is missing', async () => {
      mockStorageService.fetch.mockResolvedValue(Buffer.from('{"resourceType":"Bundle"}'));

      const outcome = await service.process(workItem(notification('bundle.json')));

      expectFailure(outcome, ProcessingErrorKind.MALFORMED_BUNDLE);
    });

    it('should fail with NO_PATIENT_RECORDS when no entry is a patient', async () => {
      mockStorageService.fetch.mockResolvedValue(
        Buffer.from('{"entry":[{"resource":{"resourceType":"Device"}}]}'),
      );

      const outcome = await service.process(workItem(notification('bundle.json')));

      expectFailure(outcome, ProcessingErrorKind.NO_PATIENT_RECORDS);
      expect(mockStorageService.publish).not.toHaveBeenCalled();
    });

    it('should fail with UNKNOWN when the upload fails', async () => {
      mockStorageService.fetch.mockResolvedValue(Buffer.from(patientBundle));
      mockStorageService.publish.mockRejectedValue(
        new Error('S3 upload failed for patient-extracts/bundle.csv: AccessDenied'),
      );

      const outcome = await service.process(workItem(notification('bundle.json')));

      expect(outcome).toMatchObject({
        status: 'failure',
        kind: ProcessingErrorKind.UNKNOWN,
        retryable: true,
        reason:
          'Unexpected processing failure: ' +
          'S3 upload failed for patient-extracts/bundle.csv: AccessDenied',
      });
    });

    it('should turn unexpected exceptions into UNKNOWN failures', async () => {
      mockStorageService.fetch.mockResolvedValue(Buffer.from(patientBundle));
      jest.spyOn(tabularWriterService, 'write').mockImplementation(() => {
        throw new RangeError('Invalid string length');
      });

      const outcome = await service.process(workItem(notification('bundle.json')));

      expect(outcome).toMatchObject({
        status: 'failure',
        kind: ProcessingErrorKind.UNKNOWN,
        reason: 'Unexpected processing failure: Invalid string length',
      });
    });

    it('should never settle the work item itself', async () => {
      mockStorageService.fetch.mockResolvedValue(Buffer.from(patientBundle));

      await service.process(workItem(notification('bundle.json')));
      await service.process(workItem('not json'));

      expect(settler.deleteMessage).not.toHaveBeenCalled();
      expect(settler.changeVisibility).not.toHaveBeenCalled();
    });
  });
});
