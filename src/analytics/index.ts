import type { PortfolioRow } from '../canon/portfolioRow.js';
import { monthStart } from '../lib/time.js';
import { portfolioTableRow, PORTFOLIO_COLUMNS, type Table, type TableRow } from '../sinks/tables.js';
import type {
  CohortOverviewRow,
  CohortPerformanceRow,
  DelinquencyByInstallerRow,
  DelinquencyByRiskCategoryRow,
  InstallationVolumeShareRow,
  RiskMonitoringRow
} from './types.js';

export const RISK_CREDIT_SCORE_CEILING = 680;
export const RISK_LOAN_TO_INCOME_FLOOR = 0.35;
/** A loan more than 30 days past due counts as delinquent, matching the `Delinquent` bucket. */
export const DELINQUENT_AFTER_DAYS = 30;

/** Rounds half away from zero. */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

function ratio(part: number, total: number, digits = 4): number {
  return total === 0 ? 0 : roundTo(part / total, digits);
}

function isApproved(row: PortfolioRow): boolean {
  return row.status === 'approved';
}

/** A matched loan whose loan_id is present. */
function hasServicedLoan(row: PortfolioRow): boolean {
  return row.lms_data_quality_flags !== null && !row.lms_data_quality_flags.loan_id_null;
}

/** Ascending with nulls last. */
function compareNullable(left: string | null, right: string | null): number {
  if (left === right) {
    return 0;
  }
  if (left === null) {
    return 1;
  }
  if (right === null) {
    return -1;
  }
  return left < right ? -1 : 1;
}

function groupBy<K, T>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

function compareDescNullsLast(left: string | null, right: string | null): number {
  if (left === right) {
    return 0;
  }
  if (left === null) {
    return 1;
  }
  if (right === null) {
    return -1;
  }
  return left < right ? 1 : -1;
}

/** Groups on a month plus a nullable label; the composite key is JSON so null survives. */
function groupByMonthAndLabel<T extends PortfolioRow>(
  rows: readonly T[],
  monthOf: (row: T) => string,
  labelOf: (row: T) => string | null
): Array<{ month: string; label: string | null; rows: T[] }> {
  const groups = groupBy(rows, (row) => JSON.stringify([monthOf(row), labelOf(row)]));
  return [...groups.values()].map((members) => ({
    month: monthOf(members[0]),
    label: labelOf(members[0]),
    rows: members
  }));
}

/** SUM over approved amounts, with non-approved rows contributing 0; null when nothing is summable. */
function approvedVolume(rows: readonly PortfolioRow[]): number | null {
  const contributions = rows
    .map((row) => (isApproved(row) ? row.loan_amount_eur : 0))
    .filter((value): value is number => value !== null);
  if (contributions.length === 0) {
    return null;
  }
  return contributions.reduce((sum, value) => sum + value, 0);
}

export function curatedPortfolio(
  rows: readonly PortfolioRow[],
  problematicApplicationIds: readonly string[]
): PortfolioRow[] {
  const excluded = new Set(problematicApplicationIds);
  return rows.filter((row) => row.application_id !== null && !excluded.has(row.application_id));
}

type Dated<Field extends keyof PortfolioRow> = PortfolioRow & { [K in Field]: string };

function hasApplicationDate(row: PortfolioRow): row is Dated<'application_date'> {
  return row.application_date !== null;
}

function hasDisbursementDate(row: PortfolioRow): row is Dated<'disbursement_date'> {
  return row.disbursement_date !== null;
}

export function cohortOverview(rows: readonly PortfolioRow[]): CohortOverviewRow[] {
  return groupByMonthAndLabel(
    rows.filter(hasApplicationDate),
    (row) => monthStart(row.application_date),
    (row) => row.installation_type
  )
    .map(({ month, label, rows: members }) => {
      const approved = members.filter(isApproved);
      const approvedAmounts = approved
        .map((row) => row.loan_amount_eur)
        .filter((value): value is number => value !== null);
      const volume = approvedVolume(members);

      return {
        cohort_month: month,
        installation_type: label,
        total_applications: members.length,
        approved_applications: approved.length,
        approval_rate: ratio(approved.length, members.length),
        total_approved_loan_volume: volume === null ? null : roundTo(volume, 2),
        avg_approved_loan_size:
          approvedAmounts.length === 0
            ? null
            : roundTo(approvedAmounts.reduce((sum, value) => sum + value, 0) / approvedAmounts.length, 2)
      };
    })
    .sort(
      (left, right) =>
        left.cohort_month.localeCompare(right.cohort_month) ||
        compareNullable(left.installation_type, right.installation_type)
    );
}

export function riskMonitoring(rows: readonly PortfolioRow[]): RiskMonitoringRow[] {
  return rows
    .filter(
      (row) =>
        hasServicedLoan(row) &&
        !row.data_quality_flags.credit_score_out_of_range &&
        !row.data_quality_flags.credit_score_missing &&
        row.credit_score !== null &&
        row.loan_to_income_ratio !== null &&
        row.credit_score < RISK_CREDIT_SCORE_CEILING &&
        row.loan_to_income_ratio > RISK_LOAN_TO_INCOME_FLOOR
    )
    .sort((left, right) => compareDescNullsLast(left.disbursement_date, right.disbursement_date))
    .map((row) => ({
      loan_id: row.loan_id,
      application_id: row.application_id,
      installer_partner_id: row.installer_partner_id,
      installation_type: row.installation_type,
      credit_score: row.credit_score,
      current_balance_eur: row.current_balance_eur,
      loan_amount_eur: row.loan_amount_eur,
      annual_income_eur: row.annual_income_eur,
      loan_to_income_ratio: row.loan_to_income_ratio,
      application_date: row.application_date,
      disbursement_date: row.disbursement_date,
      delinquency_bucket: row.delinquency_bucket,
      days_past_due: row.days_past_due,
      months_since_disbursement: row.months_since_disbursement,
      status: row.status
    }));
}

function delinquencyCounts(members: readonly PortfolioRow[]) {
  const delinquent = members.filter(
    (row) => row.days_past_due !== null && row.days_past_due > DELINQUENT_AFTER_DAYS
  ).length;
  return {
    total_loans: members.length,
    delinquent_loans: delinquent,
    delinquency_rate: ratio(delinquent, members.length)
  };
}

function byRateThenVolume(
  left: { delinquency_rate: number; total_loans: number },
  right: { delinquency_rate: number; total_loans: number }
): number {
  return right.delinquency_rate - left.delinquency_rate || right.total_loans - left.total_loans;
}

export function delinquencyByInstaller(rows: readonly PortfolioRow[]): DelinquencyByInstallerRow[] {
  const groups = groupBy(rows.filter(hasServicedLoan), (row) => row.installer_partner_id);
  return [...groups.entries()]
    .map(([installer, members]) => ({ installer_partner_id: installer, ...delinquencyCounts(members) }))
    .sort(
      (left, right) =>
        byRateThenVolume(left, right) || compareNullable(left.installer_partner_id, right.installer_partner_id)
    );
}

export function delinquencyByRiskCategory(rows: readonly PortfolioRow[]): DelinquencyByRiskCategoryRow[] {
  const groups = groupBy(rows.filter(hasServicedLoan), (row) => row.risk_category);
  return [...groups.entries()]
    .map(([riskCategory, members]) => ({ risk_category: riskCategory, ...delinquencyCounts(members) }))
    .sort(
      (left, right) => byRateThenVolume(left, right) || left.risk_category.localeCompare(right.risk_category)
    );
}

export function performanceByCohort(rows: readonly PortfolioRow[]): CohortPerformanceRow[] {
  const disbursed = rows.filter(hasDisbursementDate).filter(hasServicedLoan);
  const groups = groupBy(disbursed, (row) => monthStart(row.disbursement_date));

  const shareAtLeast = (members: readonly PortfolioRow[], days: number): number =>
    ratio(members.filter((row) => row.days_past_due !== null && row.days_past_due >= days).length, members.length);

  return [...groups.entries()]
    .map(([month, members]) => ({
      cohort_month: month,
      total_loans: members.length,
      dpd_30_rate: shareAtLeast(members, 30),
      dpd_60_rate: shareAtLeast(members, 60),
      dpd_90_rate: shareAtLeast(members, 90)
    }))
    .sort((left, right) => right.cohort_month.localeCompare(left.cohort_month));
}

export function installationVolumeShare(rows: readonly PortfolioRow[]): InstallationVolumeShareRow[] {
  const eligible = rows
    .filter(hasApplicationDate)
    .filter((row) => !row.data_quality_flags.installation_type_invalid);
  const volumes = groupByMonthAndLabel(
    eligible,
    (row) => monthStart(row.application_date),
    (row) => row.installation_type
  ).map(({ month, label, rows: members }) => {
    const volume = approvedVolume(members);
    return { month, label, volume: volume === null ? null : roundTo(volume, 2) };
  });

  const monthTotals = new Map<string, number>();
  for (const entry of volumes) {
    monthTotals.set(entry.month, (monthTotals.get(entry.month) ?? 0) + (entry.volume ?? 0));
  }

  return volumes
    .map(({ month, label, volume }) => {
      const total = monthTotals.get(month) ?? 0;
      return {
        cohort_month: month,
        installation_type: label,
        approved_loan_volume: volume,
        monthly_volume_share: volume === null || total === 0 ? null : roundTo(volume / total, 4)
      };
    })
    .sort(
      (left, right) =>
        left.cohort_month.localeCompare(right.cohort_month) ||
        compareNullable(left.installation_type, right.installation_type)
    );
}

function toTable<Row extends TableRow>(name: string, rows: Row[], columns: Array<keyof Row & string>): Table {
  return { name, columns, rows };
}

export function buildAnalyticsTables(
  portfolio: readonly PortfolioRow[],
  problematicApplicationIds: readonly string[]
): Table[] {
  return [
    {
      name: 'curated_portfolio',
      columns: PORTFOLIO_COLUMNS,
      rows: curatedPortfolio(portfolio, problematicApplicationIds).map(portfolioTableRow)
    },
    toTable('cohort_overview', cohortOverview(portfolio), [
      'cohort_month',
      'installation_type',
      'total_applications',
      'approved_applications',
      'approval_rate',
      'total_approved_loan_volume',
      'avg_approved_loan_size'
    ]),
    toTable('risk_monitoring', riskMonitoring(portfolio), [
      'loan_id',
      'application_id',
      'installer_partner_id',
      'installation_type',
      'credit_score',
      'current_balance_eur',
      'loan_amount_eur',
      'annual_income_eur',
      'loan_to_income_ratio',
      'application_date',
      'disbursement_date',
      'delinquency_bucket',
      'days_past_due',
      'months_since_disbursement',
      'status'
    ]),
    toTable('delinquency_by_installer', delinquencyByInstaller(portfolio), [
      'installer_partner_id',
      'total_loans',
      'delinquent_loans',
      'delinquency_rate'
    ]),
    toTable('delinquency_by_risk_category', delinquencyByRiskCategory(portfolio), [
      'risk_category',
      'total_loans',
      'delinquent_loans',
      'delinquency_rate'
    ]),
    toTable('performance_by_cohort', performanceByCohort(portfolio), [
      'cohort_month',
      'total_loans',
      'dpd_30_rate',
      'dpd_60_rate',
      'dpd_90_rate'
    ]),
    toTable('installation_volume_share', installationVolumeShare(portfolio), [
      'cohort_month',
      'installation_type',
      'approved_loan_volume',
      'monthly_volume_share'
    ])
  ];
}
