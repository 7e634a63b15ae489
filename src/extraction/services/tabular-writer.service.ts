import { Injectable } from '@nestjs/common';
import { Options } from 'csv-stringify';
import { stringify } from 'csv-stringify/sync';
import {
  PATIENT_ROW_COLUMNS,
  PatientRow,
} from '../interfaces/patient-row.interface';

export const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';

/**
 * Service for serializing patient rows as CSV.
 *
 * @remarks
 * Output follows the Excel dialect: comma delimiter, double-quote
 * quoting only where needed, CRLF line endings. Values containing a bare
 * CR or LF are quoted as well.
 */
@Injectable()
export class TabularWriterService {
  private readonly options: Options = {
    record_delimiter: 'windows',
    quoted_match: /[\r\n]/,
    cast: {
      boolean: (value: boolean) => (value ? 'True' : 'False'),
    },
  };

  /**
   * Serialize rows with a header line, which is written even when there
   * are no rows.
   */
  write(rows: readonly PatientRow[]): Buffer {
    const header = stringify(
      [PATIENT_ROW_COLUMNS.map((column) => column.header)],
      this.options,
    );
    const body = stringify(
      rows.map((row) => PATIENT_ROW_COLUMNS.map((column) => row[column.key])),
      this.options,
    );

    return Buffer.from(header + body, 'utf-8');
  }
}
