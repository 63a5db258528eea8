import { APPLICATION_FLAG_NAMES, type Application, type ApplicationFlagName } from '../../canon/application.js';
import { LMS_FLAG_NAMES, type LmsFlagName, type LmsRecord } from '../../canon/lmsRecord.js';
import type { RawRecord } from '../../ingress/rawRecord.js';
import { sha256 } from '../../lib/hash.js';
import type { QualityDataset, QualityIssue } from './types.js';

export const QUARANTINE_RULE = 'row_shifted_quarantined';

const APPLICATION_RULE_MESSAGES: Record<ApplicationFlagName, string> = {
  application_id_null: 'application_id is missing or blank.',
  application_id_duplicate: 'application_id appears more than once in the feed.',
  loan_amount_non_positive: 'loan_amount_eur is missing, unparseable or not positive.',
  credit_score_missing: 'credit_score is missing or unparseable.',
  credit_score_out_of_range: 'credit_score is outside 300-850.',
  postal_code_invalid: 'postal_code is not exactly five digits.',
  installation_type_invalid: 'installation_type is not solar_pv, solar_battery or heat_pump.',
  system_size_invalid: 'system_size_kwp is missing or not positive for a solar installation.',
  system_size_present_for_heat_pump: 'system_size_kwp is set for a heat_pump installation.'
};

const LMS_RULE_MESSAGES: Record<LmsFlagName, string> = {
  loan_id_null: 'loan_id is missing or blank.',
  application_id_null: 'application_id is missing or blank.',
  application_id_invalid_format: 'application_id does not match APP followed by digits.',
  loan_id_duplicate: 'loan_id appears more than once in the feed.',
  application_id_duplicate: 'application_id appears on more than one loan.',
  current_balance_negative: 'current_balance_eur is negative.',
  days_past_due_negative: 'days_past_due is negative.',
  last_payment_before_disbursement: 'last_payment_date is earlier than disbursement_date.',
  next_due_before_disbursement: 'next_payment_due is earlier than disbursement_date.',
  last_payment_after_next_due: 'last_payment_date is later than next_payment_due.'
};

function createIssue(input: Omit<QualityIssue, 'issue_id'>): QualityIssue {
  return {
    issue_id: sha256(`${input.run_date}|${input.dataset}|${input.source_row}|${input.rule}`),
    ...input
  };
}

function issueBase(runDate: string, dataset: QualityDataset, sourceRow: number) {
  return { run_date: runDate, dataset, source_row: sourceRow };
}

export function collectQualityIssues(input: {
  runDate: string;
  quarantined: readonly RawRecord[];
  applications: readonly Application[];
  lmsRecords: readonly LmsRecord[];
}): QualityIssue[] {
  const issues: QualityIssue[] = [];

  for (const record of input.quarantined) {
    issues.push(
      createIssue({
        ...issueBase(input.runDate, 'applications', record.row),
        application_id: record.values.application_id ?? null,
        loan_id: null,
        severity: 'error',
        rule: QUARANTINE_RULE,
        message: 'Row decoded with cells past the last column and was quarantined without repair.',
        sample: { overflow: record.overflow }
      })
    );
  }

  for (const application of input.applications) {
    for (const rule of APPLICATION_FLAG_NAMES) {
      if (!application.data_quality_flags[rule]) {
        continue;
      }
      issues.push(
        createIssue({
          ...issueBase(input.runDate, 'applications', application.source_row),
          application_id: application.application_id,
          loan_id: null,
          severity: 'warn',
          rule,
          message: APPLICATION_RULE_MESSAGES[rule]
        })
      );
    }
  }

  for (const record of input.lmsRecords) {
    for (const rule of LMS_FLAG_NAMES) {
      if (!record.data_quality_flags[rule]) {
        continue;
      }
      issues.push(
        createIssue({
          ...issueBase(input.runDate, 'lms', record.source_row),
          application_id: record.application_id,
          loan_id: record.loan_id,
          severity: 'warn',
          rule,
          message: LMS_RULE_MESSAGES[rule]
        })
      );
    }
  }

  return issues;
}
