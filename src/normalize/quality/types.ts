import { z } from 'zod';

export type QualityDataset = 'applications' | 'lms';

export interface QualityIssue {
  issue_id: string;
  run_date: string;
  dataset: QualityDataset;
  source_row: number;
  application_id: string | null;
  loan_id: string | null;
  severity: 'warn' | 'error';
  rule: string;
  message: string;
  sample?: Record<string, unknown>;
}

const count = z.number().int().nonnegative();

export const applicationFlagCountsSchema = z.object({
  application_id_null: count,
  application_id_duplicate: count,
  loan_amount_non_positive: count,
  credit_score_missing: count,
  credit_score_out_of_range: count,
  postal_code_invalid: count,
  installation_type_invalid: count,
  system_size_invalid: count,
  system_size_present_for_heat_pump: count
});

export const lmsFlagCountsSchema = z.object({
  loan_id_null: count,
  application_id_null: count,
  application_id_invalid_format: count,
  loan_id_duplicate: count,
  application_id_duplicate: count,
  current_balance_negative: count,
  days_past_due_negative: count,
  last_payment_before_disbursement: count,
  next_due_before_disbursement: count,
  last_payment_after_next_due: count
});

export const dataQualityReportSchema = z.object({
  applications_raw: count,
  applications_processed: count,
  quarantined_applications: count,
  lms_processed: count,
  application_flag_counts: applicationFlagCountsSchema,
  lms_flag_counts: lmsFlagCountsSchema,
  /** Distinct, non-blank, sorted by code unit. */
  problematic_application_ids: z.array(z.string()),
  processed_at: z.string()
});

export type ApplicationFlagCounts = z.infer<typeof applicationFlagCountsSchema>;
export type LmsFlagCounts = z.infer<typeof lmsFlagCountsSchema>;
export type DataQualityReport = z.infer<typeof dataQualityReportSchema>;
