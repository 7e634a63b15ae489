/**
 * Reason a work item could not be turned into a CSV extract.
 *
 * Every kind ends in the same remedy today (the message is made visible
 * again), but the kind is logged so operators can tell transient outages
 * from files that will never succeed.
 */
export enum ProcessingErrorKind {
  /** Queue message body is not a usable storage event */
  BAD_NOTIFICATION = 'bad_notification',

  /** Input object could not be downloaded */
  FETCH_ERROR = 'fetch_error',

  /** Input is not JSON, or has no entry list */
  MALFORMED_BUNDLE = 'malformed_bundle',

  /** Bundle parsed but contained no patient entries */
  NO_PATIENT_RECORDS = 'no_patient_records',

  /** Anything else, including upload failures */
  UNKNOWN = 'unknown',
}

const RETRYABLE_KINDS: ReadonlySet<ProcessingErrorKind> = new Set([
  ProcessingErrorKind.FETCH_ERROR,
  ProcessingErrorKind.UNKNOWN,
]);

/**
 * Whether re-running the same message could succeed.
 */
export function isRetryable(kind: ProcessingErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}
