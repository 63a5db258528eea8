import { z } from 'zod';
import { applicationSchema } from './application.js';
import { lmsFlagsSchema } from './lmsRecord.js';
import { DELINQUENCY_BUCKETS } from './rules.js';

export const portfolioRowSchema = applicationSchema.extend({
  loan_id: z.string().nullable(),
  lms_application_id: z.string().nullable(),
  disbursement_date: z.string().nullable(),
  current_balance_eur: z.number().nullable(),
  days_past_due: z.number().int().nullable(),
  payment_status: z.string().nullable(),
  last_payment_date: z.string().nullable(),
  next_payment_due: z.string().nullable(),
  lms_data_quality_flags: lmsFlagsSchema.nullable(),
  lms_processed_at: z.string().nullable(),
  delinquency_bucket: z.enum(DELINQUENCY_BUCKETS).nullable(),
  months_since_disbursement: z.number().int().nullable()
});

export type PortfolioRow = z.infer<typeof portfolioRowSchema>;
