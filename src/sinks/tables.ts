import { APPLICATION_COLUMNS, LMS_COLUMNS } from '../config/feeds.js';
import { APPLICATION_FLAG_NAMES, type Application, type ApplicationQualityFlags } from '../canon/application.js';
import { LMS_FLAG_NAMES, type LmsQualityFlags } from '../canon/lmsRecord.js';
import type { PortfolioRow } from '../canon/portfolioRow.js';
import type { DataQualityReport } from '../normalize/quality/types.js';

export type CellValue = string | number | boolean | null;
export type TableRow = Record<string, CellValue>;

export interface Table {
  name: string;
  columns: string[];
  rows: TableRow[];
}

const LMS_DETAIL_COLUMNS = LMS_COLUMNS.filter(
  (column) => column !== 'loan_id' && column !== 'application_id'
);

export const CLEANED_APPLICATION_COLUMNS: string[] = [
  ...APPLICATION_COLUMNS,
  ...APPLICATION_FLAG_NAMES.map((name) => `flag_${name}`),
  'risk_category',
  'loan_to_income_ratio',
  'data_quality_flags',
  'processed_at'
];

export const PORTFOLIO_COLUMNS: string[] = [
  ...CLEANED_APPLICATION_COLUMNS,
  'loan_id',
  'lms_application_id',
  ...LMS_DETAIL_COLUMNS,
  ...LMS_FLAG_NAMES.map((name) => `lms_flag_${name}`),
  'lms_data_quality_flags',
  'lms_processed_at',
  'delinquency_bucket',
  'months_since_disbursement'
];

export const QUALITY_REPORT_COLUMNS: string[] = [
  'applications_raw',
  'applications_processed',
  'quarantined_applications',
  'lms_processed',
  ...APPLICATION_FLAG_NAMES.map((name) => `app_${name}`),
  ...LMS_FLAG_NAMES.map((name) => `lms_${name}`),
  'problematic_application_ids',
  'processed_at'
];

/** Flags serialize in their declared rule order. */
export function flagsJson(flags: ApplicationQualityFlags | LmsQualityFlags): string {
  return JSON.stringify(flags);
}

export function cleanedApplicationRow(application: Application): TableRow {
  const row: TableRow = {
    application_id: application.application_id,
    customer_email: application.customer_email,
    installer_partner_id: application.installer_partner_id,
    installation_type: application.installation_type,
    system_size_kwp: application.system_size_kwp,
    loan_amount_eur: application.loan_amount_eur,
    loan_term_months: application.loan_term_months,
    application_date: application.application_date,
    credit_score: application.credit_score,
    annual_income_eur: application.annual_income_eur,
    postal_code: application.postal_code,
    status: application.status
  };
  for (const name of APPLICATION_FLAG_NAMES) {
    row[`flag_${name}`] = application.data_quality_flags[name];
  }
  row.risk_category = application.risk_category;
  row.loan_to_income_ratio = application.loan_to_income_ratio;
  row.data_quality_flags = flagsJson(application.data_quality_flags);
  row.processed_at = application.processed_at;
  return row;
}

export function portfolioTableRow(portfolioRow: PortfolioRow): TableRow {
  const row: TableRow = {
    ...cleanedApplicationRow(portfolioRow),
    loan_id: portfolioRow.loan_id,
    lms_application_id: portfolioRow.lms_application_id,
    disbursement_date: portfolioRow.disbursement_date,
    current_balance_eur: portfolioRow.current_balance_eur,
    days_past_due: portfolioRow.days_past_due,
    payment_status: portfolioRow.payment_status,
    last_payment_date: portfolioRow.last_payment_date,
    next_payment_due: portfolioRow.next_payment_due
  };
  const lmsFlags = portfolioRow.lms_data_quality_flags;
  for (const name of LMS_FLAG_NAMES) {
    row[`lms_flag_${name}`] = lmsFlags === null ? null : lmsFlags[name];
  }
  row.lms_data_quality_flags = lmsFlags === null ? null : flagsJson(lmsFlags);
  row.lms_processed_at = portfolioRow.lms_processed_at;
  row.delinquency_bucket = portfolioRow.delinquency_bucket;
  row.months_since_disbursement = portfolioRow.months_since_disbursement;
  return row;
}

export function qualityReportRow(report: DataQualityReport): TableRow {
  const row: TableRow = {
    applications_raw: report.applications_raw,
    applications_processed: report.applications_processed,
    quarantined_applications: report.quarantined_applications,
    lms_processed: report.lms_processed
  };
  for (const name of APPLICATION_FLAG_NAMES) {
    row[`app_${name}`] = report.application_flag_counts[name];
  }
  for (const name of LMS_FLAG_NAMES) {
    row[`lms_${name}`] = report.lms_flag_counts[name];
  }
  row.problematic_application_ids = JSON.stringify(report.problematic_application_ids);
  row.processed_at = report.processed_at;
  return row;
}

export function buildOutputTables(input: {
  applications: readonly Application[];
  portfolio: readonly PortfolioRow[];
  qualityReport: DataQualityReport;
}): { cleanedApplications: Table; loanPortfolio: Table; dataQualityReport: Table } {
  return {
    cleanedApplications: {
      name: 'cleaned_applications',
      columns: CLEANED_APPLICATION_COLUMNS,
      rows: input.applications.map(cleanedApplicationRow)
    },
    loanPortfolio: {
      name: 'loan_portfolio',
      columns: PORTFOLIO_COLUMNS,
      rows: input.portfolio.map(portfolioTableRow)
    },
    dataQualityReport: {
      name: 'data_quality_report',
      columns: QUALITY_REPORT_COLUMNS,
      rows: [qualityReportRow(input.qualityReport)]
    }
  };
}
