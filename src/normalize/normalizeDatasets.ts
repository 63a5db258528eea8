import type { Application } from '../canon/application.js';
import type { LmsRecord } from '../canon/lmsRecord.js';
import type { PortfolioRow } from '../canon/portfolioRow.js';
import type { RawRecord } from '../ingress/rawRecord.js';
import { log } from '../lib/log.js';
import type { RunClock } from '../lib/time.js';
import { validateApplications } from './applications.js';
import { validateLmsRecords } from './lms.js';
import { joinPortfolio } from './portfolio.js';
import { evaluateQuality } from './quality/index.js';
import type { DataQualityReport, QualityIssue } from './quality/types.js';
import { classifyApplications } from './quarantine.js';

export interface NormalizedOutput {
  quarantinedApplications: RawRecord[];
  applications: Application[];
  lmsRecords: LmsRecord[];
  portfolio: PortfolioRow[];
}

export interface NormalizedWithQuality extends NormalizedOutput {
  qualityIssues: QualityIssue[];
  qualityReport: DataQualityReport;
}

export function normalizeDatasets(input: {
  applicationsRaw: readonly RawRecord[];
  lmsRaw: readonly RawRecord[];
  clock: RunClock;
}): NormalizedOutput {
  const { good, quarantined } = classifyApplications(input.applicationsRaw);
  log.info('classified raw applications', { good: good.length, quarantined: quarantined.length });

  log.info('Building cleaned_applications with validation flags and transformations...');
  const applications = validateApplications(good, input.clock);

  log.info('Building lms_cleaned with validation flags and transformations...');
  const lmsRecords = validateLmsRecords(input.lmsRaw, input.clock);

  log.info('Building loan_portfolio (applications + LMS)...');
  const portfolio = joinPortfolio(applications, lmsRecords, input.clock);

  return {
    quarantinedApplications: quarantined,
    applications,
    lmsRecords,
    portfolio
  };
}

export function normalizeAndValidateDatasets(input: {
  applicationsRaw: readonly RawRecord[];
  lmsRaw: readonly RawRecord[];
  clock: RunClock;
}): NormalizedWithQuality {
  const normalized = normalizeDatasets(input);

  log.info('Building data_quality_report summary...');
  const quality = evaluateQuality({
    rawApplicationCount: input.applicationsRaw.length,
    quarantined: normalized.quarantinedApplications,
    applications: normalized.applications,
    lmsRecords: normalized.lmsRecords,
    clock: input.clock
  });

  return {
    ...normalized,
    qualityIssues: quality.issues,
    qualityReport: quality.report
  };
}
