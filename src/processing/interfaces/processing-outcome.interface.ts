import { ProcessingErrorKind } from '../../shared/constants/processing-error-kind.enum';

export interface ProcessingSuccess {
  status: 'success';

  /** Decoded key of the input object */
  inputKey: string;

  /** Key the CSV extract was written to */
  outputKey: string;

  /** Patient rows written */
  rowCount: number;

  /** Total processing time (ms) */
  durationMs: number;
}

export interface ProcessingFailure {
  status: 'failure';

  kind: ProcessingErrorKind;

  /** Human-readable failure description */
  reason: string;

  /** Whether redelivering the same message could succeed */
  retryable: boolean;

  /** Total processing time (ms) */
  durationMs: number;
}

/**
 * Result of running one work item through the pipeline.
 */
export type ProcessingOutcome = ProcessingSuccess | ProcessingFailure;
