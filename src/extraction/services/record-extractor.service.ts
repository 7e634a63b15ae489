import { Injectable, Logger } from '@nestjs/common';
import { Bundle, PatientEntry } from '../interfaces/bundle.interface';
import { PatientRow } from '../interfaces/patient-row.interface';
import {
  firstOf,
  isJsonObject,
  readPath,
  readText,
  toText,
} from '../utils/read-path';
import { formatListLiteral } from '../utils/list-literal';
import { ProcessingError } from '../../shared/errors/processing.error';
import { ProcessingErrorKind } from '../../shared/constants/processing-error-kind.enum';

/**
 * Service for flattening patient bundles into rows.
 *
 * @remarks
 * **Design Decision: Fixed Column Set**
 *
 * Only the eleven demographic columns are extracted; every other field
 * in the resource is dropped.
 *
 * Justification:
 * - Downstream consumers load the extract into a fixed table
 * - A single pass over the entries is enough, no schema discovery pass
 *
 * **Design Decision: Field-Level Defaults**
 *
 * A missing or oddly typed field empties that column only.
 *
 * Production Consideration:
 * Whole-file failures (no entry list, no patients) are deterministic and
 * should be reported to an operator rather than retried.
 */
@Injectable()
export class RecordExtractorService {
  private readonly logger = new Logger(RecordExtractorService.name);

  /**
   * Extract one row per patient entry, in entry order.
   *
   * @param document - Parsed bundle JSON
   * @param source - Object key the bundle came from, used in diagnostics
   * @throws ProcessingError MALFORMED_BUNDLE when there is no entry list,
   *   NO_PATIENT_RECORDS when no entry yields a row
   */
  extract(document: unknown, source = '<inline>'): PatientRow[] {
    const bundle = this.asBundle(document, source);
    const rows: PatientRow[] = [];

    bundle.entry.forEach((entry, index) => {
      const patient = this.selectPatient(entry, index, source);
      if (patient) {
        rows.push(this.toRow(patient));
      }
    });

    if (rows.length === 0) {
      throw new ProcessingError(
        ProcessingErrorKind.NO_PATIENT_RECORDS,
        `No patient records found in ${source}`,
      );
    }

    this.logger.log(
      `Extracted ${rows.length} of ${bundle.entry.length} entries from ${source}`,
    );

    return rows;
  }

  private asBundle(document: unknown, source: string): Bundle {
    if (!isJsonObject(document)) {
      throw new ProcessingError(
        ProcessingErrorKind.MALFORMED_BUNDLE,
        `Bundle ${source} is not a JSON object`,
      );
    }

    const entries = document.entry;
    if (!Array.isArray(entries)) {
      throw new ProcessingError(
        ProcessingErrorKind.MALFORMED_BUNDLE,
        `Bundle ${source} has no entry list`,
      );
    }

    return { ...document, entry: entries };
  }

  /**
   * Returns the entry when it holds a patient resource, otherwise logs
   * why it was skipped.
   */
  private selectPatient(
    entry: unknown,
    index: number,
    source: string,
  ): PatientEntry | null {
    const url = readText(entry, ['fullUrl']);
    const label = url || `#${index}`;
    const resource = readPath(entry, ['resource']);

    if (!isJsonObject(resource) || Object.keys(resource).length === 0) {
      this.logger.warn(
        `Resource not found for url ${label} in ${source}: please check`,
      );
      return null;
    }

    const resourceType = readText(resource, ['resourceType']).toLowerCase();
    if (resourceType !== 'patient') {
      this.logger.warn(
        `Resource type is not patient for url ${label} in ${source}: please check`,
      );
      return null;
    }

    return { url, resource };
  }

  private toRow({ url, resource }: PatientEntry): PatientRow {
    const active = resource.active;

    return {
      url,
      resourceId: readText(resource, ['id']),
      lastUpdated: readText(resource, ['meta', 'lastUpdated']),
      status: readText(resource, ['text', 'status']).toLowerCase(),
      systemId: readText(resource, ['text', 'value']),
      active: typeof active === 'boolean' ? active : false,
      firstName: toText(firstOf(readPath(resource, ['name', 0, 'given']))),
      lastName: this.renderFamilyName(readPath(resource, ['name', 0, 'family'])),
      phone: readText(resource, ['telecom', 0, 'value']),
      gender: readText(resource, ['gender']),
      address: readText(resource, ['address', 0, 'value']),
    };
  }

  private renderFamilyName(family: unknown): string {
    return Array.isArray(family) ? formatListLiteral(family) : toText(family);
  }
}
