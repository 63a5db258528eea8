import { toIsoDate } from '../lib/time.js';

export const INSTALLATION_TYPES = ['solar_pv', 'solar_battery', 'heat_pump'] as const;
export type InstallationType = (typeof INSTALLATION_TYPES)[number];

export const SIZED_INSTALLATION_TYPES: readonly string[] = ['solar_pv', 'solar_battery'];

export const CREDIT_SCORE_MIN = 300;
export const CREDIT_SCORE_MAX = 850;

export const RISK_CATEGORIES = ['Unknown', 'Invalid', 'Excellent', 'Good', 'Fair', 'Poor'] as const;
export type RiskCategory = (typeof RISK_CATEGORIES)[number];

export const DELINQUENCY_BUCKETS = ['Current', 'Late', 'Delinquent', 'Default'] as const;
export type DelinquencyBucket = (typeof DELINQUENCY_BUCKETS)[number];

const POSTAL_CODE_PATTERN = /^[0-9]{5}$/;
const LMS_APPLICATION_ID_PATTERN = /^APP[0-9]+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim().length === 0;
}

export function lowerOrNull(value: string | null): string | null {
  return value === null ? null : value.toLowerCase();
}

export function normalizeEmail(value: string | null): string | null {
  return value === null ? null : value.toLowerCase().replace(/\s+/g, '');
}

/** Best-effort decimal conversion: surrounding whitespace is ignored, anything else yields null. */
export function tryParseDecimal(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Best-effort 32-bit integer conversion. Decimal and exponent text is accepted and rounded half
 * away from zero (`'720.0'` and `'719.5'` are both 720); out-of-range text yields null.
 */
export function tryParseInteger(value: string | null): number | null {
  const parsed = tryParseDecimal(value);
  if (parsed === null) {
    return null;
  }
  const rounded = Math.sign(parsed) * Math.round(Math.abs(parsed));
  if (rounded < INT32_MIN || rounded > INT32_MAX) {
    return null;
  }
  return rounded === 0 ? 0 : rounded;
}

export function tryParseDate(value: string | null): string | null {
  return value === null ? null : toIsoDate(value);
}

export function isValidPostalCode(value: string | null): boolean {
  return value !== null && POSTAL_CODE_PATTERN.test(value);
}

export function isKnownInstallationType(value: string | null): value is InstallationType {
  return value !== null && (INSTALLATION_TYPES as readonly string[]).includes(value);
}

export function isCreditScoreInRange(score: number): boolean {
  return score >= CREDIT_SCORE_MIN && score <= CREDIT_SCORE_MAX;
}

export function hasLmsApplicationIdFormat(value: string): boolean {
  return LMS_APPLICATION_ID_PATTERN.test(value);
}

export function riskCategoryFor(creditScore: number | null): RiskCategory {
  if (creditScore === null) {
    return 'Unknown';
  }
  if (!isCreditScoreInRange(creditScore)) {
    return 'Invalid';
  }
  if (creditScore >= 750) {
    return 'Excellent';
  }
  if (creditScore >= 700) {
    return 'Good';
  }
  if (creditScore >= 650) {
    return 'Fair';
  }
  return 'Poor';
}

/**
 * Negative values fall through to `Default`; they are reported separately by the
 * `days_past_due_negative` flag.
 */
export function delinquencyBucketFor(daysPastDue: number | null): DelinquencyBucket | null {
  if (daysPastDue === null) {
    return null;
  }
  if (daysPastDue === 0) {
    return 'Current';
  }
  if (daysPastDue >= 1 && daysPastDue <= 30) {
    return 'Late';
  }
  if (daysPastDue >= 31 && daysPastDue <= 90) {
    return 'Delinquent';
  }
  return 'Default';
}

export function loanToIncomeRatio(
  loanAmount: number | null,
  annualIncome: number | null
): number | null {
  if (loanAmount === null || loanAmount <= 0) {
    return null;
  }
  if (annualIncome === null || annualIncome <= 0) {
    return null;
  }
  return loanAmount / annualIncome;
}

/** Multiplicity of each key, built once per run and consulted read-only while flagging. */
export function countByKey<T>(
  items: readonly T[],
  keyOf: (item: T) => string | null
): ReadonlyMap<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) {
      continue;
    }
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

export function isDuplicateKey(counts: ReadonlyMap<string, number>, key: string | null): boolean {
  return key !== null && (counts.get(key) ?? 0) > 1;
}
