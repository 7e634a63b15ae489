/**
 * Shape of an input bundle once its entry list has been checked.
 *
 * Entries and resources stay `unknown` until read field by field, since
 * any of their keys may be missing or hold an unexpected type.
 */
export interface Bundle {
  entry: unknown[];
  [key: string]: unknown;
}

/**
 * Entry that survived the resource and type checks.
 */
export interface PatientEntry {
  url: string;
  resource: Record<string, unknown>;
}
