import { z } from 'zod';
import { rawValue, type RawRecord } from '../ingress/rawRecord.js';
import type { RunClock } from '../lib/time.js';
import {
  RISK_CATEGORIES,
  SIZED_INSTALLATION_TYPES,
  isBlank,
  isCreditScoreInRange,
  isDuplicateKey,
  isKnownInstallationType,
  isValidPostalCode,
  loanToIncomeRatio,
  lowerOrNull,
  normalizeEmail,
  riskCategoryFor,
  tryParseDate,
  tryParseDecimal,
  tryParseInteger
} from './rules.js';

export const applicationFlagsSchema = z.object({
  application_id_null: z.boolean(),
  application_id_duplicate: z.boolean(),
  loan_amount_non_positive: z.boolean(),
  credit_score_missing: z.boolean(),
  credit_score_out_of_range: z.boolean(),
  postal_code_invalid: z.boolean(),
  installation_type_invalid: z.boolean(),
  system_size_invalid: z.boolean(),
  system_size_present_for_heat_pump: z.boolean()
});

export type ApplicationQualityFlags = z.infer<typeof applicationFlagsSchema>;
export type ApplicationFlagName = keyof ApplicationQualityFlags;

export const APPLICATION_FLAG_NAMES: readonly ApplicationFlagName[] = applicationFlagsSchema.keyof().options;

export const applicationSchema = z.object({
  source_row: z.number().int().positive(),
  application_id: z.string().nullable(),
  customer_email: z.string().nullable(),
  installer_partner_id: z.string().nullable(),
  installation_type: z.string().nullable(),
  system_size_kwp: z.number().nullable(),
  loan_amount_eur: z.number().nullable(),
  loan_term_months: z.number().int().nullable(),
  application_date: z.string().nullable(),
  credit_score: z.number().int().nullable(),
  annual_income_eur: z.number().nullable(),
  postal_code: z.string().nullable(),
  status: z.string().nullable(),
  risk_category: z.enum(RISK_CATEGORIES),
  loan_to_income_ratio: z.number().nullable(),
  data_quality_flags: applicationFlagsSchema,
  processed_at: z.string()
});

export type Application = z.infer<typeof applicationSchema>;

export interface ApplicationBuildContext {
  /** Occurrences of each application_id across all well-formed rows of the run. */
  idCounts: ReadonlyMap<string, number>;
  clock: RunClock;
}

export function evaluateApplicationFlags(
  typed: Pick<
    Application,
    'application_id' | 'loan_amount_eur' | 'credit_score' | 'postal_code' | 'installation_type' | 'system_size_kwp'
  >,
  idCounts: ReadonlyMap<string, number>
): ApplicationQualityFlags {
  const { application_id, loan_amount_eur, credit_score, postal_code, installation_type, system_size_kwp } =
    typed;

  return {
    application_id_null: isBlank(application_id),
    application_id_duplicate: isDuplicateKey(idCounts, application_id),
    loan_amount_non_positive: loan_amount_eur === null || loan_amount_eur <= 0,
    credit_score_missing: credit_score === null,
    credit_score_out_of_range: credit_score !== null && !isCreditScoreInRange(credit_score),
    postal_code_invalid: !isValidPostalCode(postal_code),
    installation_type_invalid: !isKnownInstallationType(installation_type),
    system_size_invalid:
      installation_type !== null &&
      SIZED_INSTALLATION_TYPES.includes(installation_type) &&
      (system_size_kwp === null || system_size_kwp <= 0),
    system_size_present_for_heat_pump: installation_type === 'heat_pump' && system_size_kwp !== null
  };
}

export function buildApplication(record: RawRecord, context: ApplicationBuildContext): Application {
  const value = (column: string): string | null => rawValue(record, column);

  const typed = {
    application_id: value('application_id'),
    customer_email: normalizeEmail(value('customer_email')),
    installer_partner_id: value('installer_partner_id'),
    installation_type: value('installation_type'),
    system_size_kwp: tryParseDecimal(value('system_size_kwp')),
    loan_amount_eur: tryParseDecimal(value('loan_amount_eur')),
    loan_term_months: tryParseInteger(value('loan_term_months')),
    application_date: tryParseDate(value('application_date')),
    credit_score: tryParseInteger(value('credit_score')),
    annual_income_eur: tryParseDecimal(value('annual_income_eur')),
    postal_code: value('postal_code'),
    status: lowerOrNull(value('status'))
  };

  return applicationSchema.parse({
    source_row: record.row,
    ...typed,
    risk_category: riskCategoryFor(typed.credit_score),
    loan_to_income_ratio: loanToIncomeRatio(typed.loan_amount_eur, typed.annual_income_eur),
    data_quality_flags: evaluateApplicationFlags(typed, context.idCounts),
    processed_at: context.clock.processedAt
  });
}

export function hasAnyApplicationFlag(application: Application): boolean {
  return APPLICATION_FLAG_NAMES.some((name) => application.data_quality_flags[name]);
}
