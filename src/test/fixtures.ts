import type { ApplicationColumn, LmsColumn } from '../config/feeds.js';
import type { RawRecord } from '../ingress/rawRecord.js';
import type { RunClock } from '../lib/time.js';

export const TEST_CLOCK: RunClock = {
  processedAt: '2024-06-15T08:30:00Z',
  processingDate: '2024-06-15'
};

const BASE_APPLICATION: Record<ApplicationColumn, string | null> = {
  application_id: 'APP001',
  customer_email: ' Jane.Doe@Example.com ',
  installer_partner_id: 'INST01',
  installation_type: 'solar_pv',
  system_size_kwp: '6.5',
  loan_amount_eur: '20000',
  loan_term_months: '120',
  application_date: '2024-01-15',
  credit_score: '720',
  annual_income_eur: '50000',
  postal_code: '10115',
  status: 'Approved'
};

const BASE_LMS: Record<LmsColumn, string | null> = {
  loan_id: 'LN001',
  application_id: 'APP001',
  disbursement_date: '2024-02-01',
  current_balance_eur: '18000.50',
  days_past_due: '0',
  payment_status: 'Current',
  last_payment_date: '2024-05-01',
  next_payment_due: '2024-06-01'
};

export function rawApplication(
  overrides: Partial<Record<ApplicationColumn, string | null>> = {},
  row = 1,
  overflow: Array<string | null> = []
): RawRecord {
  return {
    feed: 'applications',
    row,
    values: { ...BASE_APPLICATION, ...overrides },
    overflow
  };
}

export function rawLms(overrides: Partial<Record<LmsColumn, string | null>> = {}, row = 1): RawRecord {
  return {
    feed: 'lms',
    row,
    values: { ...BASE_LMS, ...overrides },
    overflow: []
  };
}

export const APPLICATIONS_HEADER =
  'application_id,customer_email,installer_partner_id,installation_type,system_size_kwp,loan_amount_eur,loan_term_months,application_date,credit_score,annual_income_eur,postal_code,status';

export const LMS_HEADER =
  'loan_id,application_id,disbursement_date,current_balance_eur,days_past_due,payment_status,last_payment_date,next_payment_due';

export function csvText(header: string, lines: string[]): string {
  return `${[header, ...lines].join('\n')}\n`;
}
