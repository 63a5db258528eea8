export const APPLICATION_COLUMNS = [
  'application_id',
  'customer_email',
  'installer_partner_id',
  'installation_type',
  'system_size_kwp',
  'loan_amount_eur',
  'loan_term_months',
  'application_date',
  'credit_score',
  'annual_income_eur',
  'postal_code',
  'status'
] as const;

export const LMS_COLUMNS = [
  'loan_id',
  'application_id',
  'disbursement_date',
  'current_balance_eur',
  'days_past_due',
  'payment_status',
  'last_payment_date',
  'next_payment_due'
] as const;

export type ApplicationColumn = (typeof APPLICATION_COLUMNS)[number];
export type LmsColumn = (typeof LMS_COLUMNS)[number];

export type FeedName = 'applications' | 'lms';

export interface FeedLayout {
  feed: FeedName;
  columns: readonly string[];
}

export const FEED_LAYOUTS: Record<FeedName, FeedLayout> = {
  applications: { feed: 'applications', columns: APPLICATION_COLUMNS },
  lms: { feed: 'lms', columns: LMS_COLUMNS }
};

export const DATASET_NAMES = {
  raw_applications: 'raw_applications',
  quarantined_applications: 'quarantined_applications',
  cleaned_applications: 'cleaned_applications',
  lms_cleaned: 'lms_cleaned',
  loan_portfolio: 'loan_portfolio',
  data_quality_report: 'data_quality_report',
  data_quality_issues: 'data_quality_issues'
} as const;

export const OUTPUT_FILES = {
  cleaned_applications: 'cleaned_applications.csv',
  loan_portfolio: 'loan_portfolio.csv',
  data_quality_report: 'data_quality_report.csv'
} as const;
