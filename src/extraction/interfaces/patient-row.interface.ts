/**
 * One flattened patient entry.
 */
export interface PatientRow {
  /** Entry `fullUrl` */
  url: string;

  resourceId: string;

  /** `meta.lastUpdated` as written in the bundle */
  lastUpdated: string;

  /** `text.status`, lower-cased */
  status: string;

  /** `text.value` */
  systemId: string;

  active: boolean;

  firstName: string;

  /** List-valued family names keep their list rendering */
  lastName: string;

  phone: string;

  gender: string;

  address: string;
}

/**
 * CSV columns in output order, mapped to row properties.
 */
export const PATIENT_ROW_COLUMNS: ReadonlyArray<{
  key: keyof PatientRow;
  header: string;
}> = [
  { key: 'url', header: 'url' },
  { key: 'resourceId', header: 'resource_id' },
  { key: 'lastUpdated', header: 'last_updated' },
  { key: 'status', header: 'status' },
  { key: 'systemId', header: 'system_id' },
  { key: 'active', header: 'active' },
  { key: 'firstName', header: 'first_name' },
  { key: 'lastName', header: 'last_name' },
  { key: 'phone', header: 'phone' },
  { key: 'gender', header: 'gender' },
  { key: 'address', header: 'address' },
];
