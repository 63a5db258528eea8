import { z } from 'zod';
import { rawValue, type RawRecord } from '../ingress/rawRecord.js';
import type { RunClock } from '../lib/time.js';
import {
  DELINQUENCY_BUCKETS,
  delinquencyBucketFor,
  hasLmsApplicationIdFormat,
  isBlank,
  isDuplicateKey,
  lowerOrNull,
  tryParseDate,
  tryParseDecimal,
  tryParseInteger
} from './rules.js';

export const lmsFlagsSchema = z.object({
  loan_id_null: z.boolean(),
  application_id_null: z.boolean(),
  application_id_invalid_format: z.boolean(),
  loan_id_duplicate: z.boolean(),
  application_id_duplicate: z.boolean(),
  current_balance_negative: z.boolean(),
  days_past_due_negative: z.boolean(),
  last_payment_before_disbursement: z.boolean(),
  next_due_before_disbursement: z.boolean(),
  last_payment_after_next_due: z.boolean()
});

export type LmsQualityFlags = z.infer<typeof lmsFlagsSchema>;
export type LmsFlagName = keyof LmsQualityFlags;

export const LMS_FLAG_NAMES: readonly LmsFlagName[] = lmsFlagsSchema.keyof().options;

export const lmsRecordSchema = z.object({
  source_row: z.number().int().positive(),
  loan_id: z.string().nullable(),
  application_id: z.string().nullable(),
  disbursement_date: z.string().nullable(),
  current_balance_eur: z.number().nullable(),
  days_past_due: z.number().int().nullable(),
  payment_status: z.string().nullable(),
  last_payment_date: z.string().nullable(),
  next_payment_due: z.string().nullable(),
  delinquency_bucket: z.enum(DELINQUENCY_BUCKETS).nullable(),
  data_quality_flags: lmsFlagsSchema,
  processed_at: z.string()
});

export type LmsRecord = z.infer<typeof lmsRecordSchema>;

export interface LmsDuplicateCounts {
  loanIds: ReadonlyMap<string, number>;
  applicationIds: ReadonlyMap<string, number>;
}

export interface LmsBuildContext {
  duplicates: LmsDuplicateCounts;
  clock: RunClock;
}

/** Both dates are `yyyy-MM-dd`, so string order is calendar order. */
function isBefore(left: string | null, right: string | null): boolean {
  return left !== null && right !== null && left < right;
}

export function evaluateLmsFlags(
  typed: Pick<
    LmsRecord,
    | 'loan_id'
    | 'application_id'
    | 'disbursement_date'
    | 'current_balance_eur'
    | 'days_past_due'
    | 'last_payment_date'
    | 'next_payment_due'
  >,
  duplicates: LmsDuplicateCounts
): LmsQualityFlags {
  return {
    loan_id_null: isBlank(typed.loan_id),
    application_id_null: isBlank(typed.application_id),
    application_id_invalid_format:
      typed.application_id !== null && !hasLmsApplicationIdFormat(typed.application_id),
    loan_id_duplicate: isDuplicateKey(duplicates.loanIds, typed.loan_id),
    application_id_duplicate: isDuplicateKey(duplicates.applicationIds, typed.application_id),
    current_balance_negative: typed.current_balance_eur !== null && typed.current_balance_eur < 0,
    days_past_due_negative: typed.days_past_due !== null && typed.days_past_due < 0,
    last_payment_before_disbursement: isBefore(typed.last_payment_date, typed.disbursement_date),
    next_due_before_disbursement: isBefore(typed.next_payment_due, typed.disbursement_date),
    last_payment_after_next_due: isBefore(typed.next_payment_due, typed.last_payment_date)
  };
}

export function buildLmsRecord(record: RawRecord, context: LmsBuildContext): LmsRecord {
  const value = (column: string): string | null => rawValue(record, column);

  const typed = {
    loan_id: value('loan_id'),
    application_id: value('application_id'),
    disbursement_date: tryParseDate(value('disbursement_date')),
    current_balance_eur: tryParseDecimal(value('current_balance_eur')),
    days_past_due: tryParseInteger(value('days_past_due')),
    payment_status: lowerOrNull(value('payment_status')),
    last_payment_date: tryParseDate(value('last_payment_date')),
    next_payment_due: tryParseDate(value('next_payment_due'))
  };

  return lmsRecordSchema.parse({
    source_row: record.row,
    ...typed,
    delinquency_bucket: delinquencyBucketFor(typed.days_past_due),
    data_quality_flags: evaluateLmsFlags(typed, context.duplicates),
    processed_at: context.clock.processedAt
  });
}

export function hasAnyLmsFlag(record: LmsRecord): boolean {
  return LMS_FLAG_NAMES.some((name) => record.data_quality_flags[name]);
}
