import { APPLICATION_COLUMNS } from '../config/feeds.js';
import type { RawRecord } from '../ingress/rawRecord.js';
import { isBlank } from '../canon/rules.js';

export interface QuarantineResult {
  good: RawRecord[];
  quarantined: RawRecord[];
}

/**
 * A row whose decoding produced a non-blank cell past the last application column was shifted by
 * an unquoted delimiter inside one of its fields. Which field absorbed it cannot be known, so the
 * row is set aside untouched. Rows with several shifted fields are treated the same way.
 */
export function isShiftedRow(record: RawRecord): boolean {
  return record.overflow.some((cell) => !isBlank(cell));
}

export function classifyApplications(records: readonly RawRecord[]): QuarantineResult {
  const good: RawRecord[] = [];
  const quarantined: RawRecord[] = [];

  for (const record of records) {
    if (isShiftedRow(record)) {
      quarantined.push(record);
      continue;
    }

    const values: Record<string, string | null> = {};
    for (const column of APPLICATION_COLUMNS) {
      values[column] = record.values[column] ?? null;
    }
    good.push({ ...record, values, overflow: [] });
  }

  return { good, quarantined };
}
