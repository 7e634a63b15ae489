import {
  ProcessingErrorKind,
  isRetryable,
} from '../constants/processing-error-kind.enum';

/**
 * Error raised by any step of the file processing pipeline.
 */
export class ProcessingError extends Error {
  constructor(
    readonly kind: ProcessingErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProcessingError';
  }

  get retryable(): boolean {
    return isRetryable(this.kind);
  }

  /**
   * Wrap an arbitrary thrown value, keeping the kind of errors that
   * already carry one.
   */
  static from(
    error: unknown,
    kind: ProcessingErrorKind,
    context: string,
  ): ProcessingError {
    if (error instanceof ProcessingError) {
      return error;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    return new ProcessingError(kind, `${context}: ${message}`, {
      cause: error,
    });
  }
}
