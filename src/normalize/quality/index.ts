import { APPLICATION_FLAG_NAMES, hasAnyApplicationFlag, type Application } from '../../canon/application.js';
import { LMS_FLAG_NAMES, hasAnyLmsFlag, type LmsRecord } from '../../canon/lmsRecord.js';
import { isBlank } from '../../canon/rules.js';
import type { RawRecord } from '../../ingress/rawRecord.js';
import type { RunClock } from '../../lib/time.js';
import { collectQualityIssues } from './issues.js';
import type { ApplicationFlagCounts, DataQualityReport, LmsFlagCounts, QualityIssue } from './types.js';

function emptyApplicationCounts(): ApplicationFlagCounts {
  return {
    application_id_null: 0,
    application_id_duplicate: 0,
    loan_amount_non_positive: 0,
    credit_score_missing: 0,
    credit_score_out_of_range: 0,
    postal_code_invalid: 0,
    installation_type_invalid: 0,
    system_size_invalid: 0,
    system_size_present_for_heat_pump: 0
  };
}

function emptyLmsCounts(): LmsFlagCounts {
  return {
    loan_id_null: 0,
    application_id_null: 0,
    application_id_invalid_format: 0,
    loan_id_duplicate: 0,
    application_id_duplicate: 0,
    current_balance_negative: 0,
    days_past_due_negative: 0,
    last_payment_before_disbursement: 0,
    next_due_before_disbursement: 0,
    last_payment_after_next_due: 0
  };
}

function countFlags<Name extends string>(
  names: readonly Name[],
  rows: ReadonlyArray<{ data_quality_flags: Record<Name, boolean> }>,
  counts: Record<Name, number>
): Record<Name, number> {
  for (const row of rows) {
    for (const name of names) {
      if (row.data_quality_flags[name]) {
        counts[name] += 1;
      }
    }
  }
  return counts;
}

export function collectProblematicApplicationIds(
  applications: readonly Application[],
  lmsRecords: readonly LmsRecord[]
): string[] {
  const ids = new Set<string>();
  const add = (id: string | null): void => {
    if (id !== null && !isBlank(id)) {
      ids.add(id);
    }
  };

  applications.filter(hasAnyApplicationFlag).forEach((application) => add(application.application_id));
  lmsRecords.filter(hasAnyLmsFlag).forEach((record) => add(record.application_id));

  return [...ids].sort();
}

export function buildQualityReport(input: {
  rawApplicationCount: number;
  quarantined: readonly RawRecord[];
  applications: readonly Application[];
  lmsRecords: readonly LmsRecord[];
  clock: RunClock;
}): DataQualityReport {
  return {
    applications_raw: input.rawApplicationCount,
    applications_processed: input.applications.length,
    quarantined_applications: input.quarantined.length,
    lms_processed: input.lmsRecords.length,
    application_flag_counts: countFlags(APPLICATION_FLAG_NAMES, input.applications, emptyApplicationCounts()),
    lms_flag_counts: countFlags(LMS_FLAG_NAMES, input.lmsRecords, emptyLmsCounts()),
    problematic_application_ids: collectProblematicApplicationIds(input.applications, input.lmsRecords),
    processed_at: input.clock.processedAt
  };
}

export function evaluateQuality(input: {
  rawApplicationCount: number;
  quarantined: readonly RawRecord[];
  applications: readonly Application[];
  lmsRecords: readonly LmsRecord[];
  clock: RunClock;
}): { report: DataQualityReport; issues: QualityIssue[] } {
  return {
    report: buildQualityReport(input),
    issues: collectQualityIssues({
      runDate: input.clock.processingDate,
      quarantined: input.quarantined,
      applications: input.applications,
      lmsRecords: input.lmsRecords
    })
  };
}
