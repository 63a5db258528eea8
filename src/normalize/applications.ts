import { buildApplication, type Application } from '../canon/application.js';
import { countByKey } from '../canon/rules.js';
import type { RawRecord } from '../ingress/rawRecord.js';
import type { RunClock } from '../lib/time.js';

export function validateApplications(goodRows: readonly RawRecord[], clock: RunClock): Application[] {
  const idCounts = countByKey(goodRows, (record) => record.values.application_id ?? null);
  return goodRows.map((record) => buildApplication(record, { idCounts, clock }));
}
