import type { RiskCategory } from '../canon/rules.js';

export type CohortOverviewRow = {
  cohort_month: string;
  installation_type: string | null;
  total_applications: number;
  approved_applications: number;
  approval_rate: number;
  total_approved_loan_volume: number | null;
  avg_approved_loan_size: number | null;
};

export type RiskMonitoringRow = {
  loan_id: string | null;
  application_id: string | null;
  installer_partner_id: string | null;
  installation_type: string | null;
  credit_score: number | null;
  current_balance_eur: number | null;
  loan_amount_eur: number | null;
  annual_income_eur: number | null;
  loan_to_income_ratio: number | null;
  application_date: string | null;
  disbursement_date: string | null;
  delinquency_bucket: string | null;
  days_past_due: number | null;
  months_since_disbursement: number | null;
  status: string | null;
};

export type DelinquencyByInstallerRow = {
  installer_partner_id: string | null;
  total_loans: number;
  delinquent_loans: number;
  delinquency_rate: number;
};

export type DelinquencyByRiskCategoryRow = {
  risk_category: RiskCategory;
  total_loans: number;
  delinquent_loans: number;
  delinquency_rate: number;
};

export type CohortPerformanceRow = {
  cohort_month: string;
  total_loans: number;
  dpd_30_rate: number;
  dpd_60_rate: number;
  dpd_90_rate: number;
};

export type InstallationVolumeShareRow = {
  cohort_month: string;
  installation_type: string | null;
  approved_loan_volume: number | null;
  monthly_volume_share: number | null;
};
