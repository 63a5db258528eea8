import { buildLmsRecord, type LmsRecord } from '../canon/lmsRecord.js';
import { countByKey, isBlank } from '../canon/rules.js';
import type { RawRecord } from '../ingress/rawRecord.js';
import type { RunClock } from '../lib/time.js';

function presentKey(value: string | null | undefined): string | null {
  return value === undefined || isBlank(value) ? null : value;
}

export function validateLmsRecords(rawRows: readonly RawRecord[], clock: RunClock): LmsRecord[] {
  const duplicates = {
    loanIds: countByKey(rawRows, (record) => presentKey(record.values.loan_id)),
    applicationIds: countByKey(rawRows, (record) => presentKey(record.values.application_id))
  };
  return rawRows.map((record) => buildLmsRecord(record, { duplicates, clock }));
}
