import { differenceInCalendarMonths, parseISO } from 'date-fns';
import type { Application } from '../canon/application.js';
import type { LmsRecord } from '../canon/lmsRecord.js';
import { portfolioRowSchema, type PortfolioRow } from '../canon/portfolioRow.js';
import { delinquencyBucketFor } from '../canon/rules.js';
import type { RunClock } from '../lib/time.js';

export function monthsBetween(fromDate: string | null, toDate: string): number | null {
  if (fromDate === null) {
    return null;
  }
  return differenceInCalendarMonths(parseISO(toDate), parseISO(fromDate));
}

function indexByApplicationId(records: readonly LmsRecord[]): Map<string, LmsRecord[]> {
  const index = new Map<string, LmsRecord[]>();
  for (const record of records) {
    if (record.application_id === null) {
      continue;
    }
    const bucket = index.get(record.application_id);
    if (bucket) {
      bucket.push(record);
    } else {
      index.set(record.application_id, [record]);
    }
  }
  return index;
}

function composeRow(application: Application, loan: LmsRecord | null, clock: RunClock): PortfolioRow {
  const daysPastDue = loan?.days_past_due ?? null;
  const disbursementDate = loan?.disbursement_date ?? null;

  return portfolioRowSchema.parse({
    ...application,
    loan_id: loan?.loan_id ?? null,
    lms_application_id: loan?.application_id ?? null,
    disbursement_date: disbursementDate,
    current_balance_eur: loan?.current_balance_eur ?? null,
    days_past_due: daysPastDue,
    payment_status: loan?.payment_status ?? null,
    last_payment_date: loan?.last_payment_date ?? null,
    next_payment_due: loan?.next_payment_due ?? null,
    lms_data_quality_flags: loan?.data_quality_flags ?? null,
    lms_processed_at: loan?.processed_at ?? null,
    delinquency_bucket: delinquencyBucketFor(daysPastDue),
    months_since_disbursement: monthsBetween(disbursementDate, clock.processingDate)
  });
}

/**
 * Left outer join on application_id with applications as the driving side. An application with
 * several matching loans yields one row per loan; one with none yields a single row whose loan
 * fields are null. Application status is not consulted.
 */
export function joinPortfolio(
  applications: readonly Application[],
  loans: readonly LmsRecord[],
  clock: RunClock
): PortfolioRow[] {
  const loansByApplicationId = indexByApplicationId(loans);
  const rows: PortfolioRow[] = [];

  for (const application of applications) {
    const matches =
      application.application_id === null
        ? undefined
        : loansByApplicationId.get(application.application_id);

    if (!matches || matches.length === 0) {
      rows.push(composeRow(application, null, clock));
      continue;
    }
    for (const loan of matches) {
      rows.push(composeRow(application, loan, clock));
    }
  }

  return rows;
}
