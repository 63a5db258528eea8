import path from 'node:path';
import { buildAnalyticsTables } from '../analytics/index.js';
import { applicationSchema } from '../canon/application.js';
import { portfolioRowSchema, type PortfolioRow } from '../canon/portfolioRow.js';
import type { AppConfig } from '../config/env.js';
import { DATASET_NAMES } from '../config/feeds.js';
import { loadFeeds } from '../ingress/loadFeeds.js';
import { PipelineError } from '../lib/errors.js';
import { writeFilesAtomically } from '../lib/fs.js';
import { log } from '../lib/log.js';
import type { RunClock } from '../lib/time.js';
import { latestDatasetDateDir, readDatasetJsonlForDate } from '../normalize/io.js';
import { normalizeAndValidateDatasets } from '../normalize/normalizeDatasets.js';
import { dataQualityReportSchema, type DataQualityReport } from '../normalize/quality/types.js';
import { renderCsv, writeOutputTables } from '../sinks/csvSink.js';
import { writeExcelFile } from '../sinks/excel/index.js';
import { buildOutputTables } from '../sinks/tables.js';
import { writeWorkStore } from '../sinks/workStore.js';

export interface PipelineSummary {
  applicationsProcessed: number;
  portfolioRows: number;
  quarantinedApplications: number;
  outputs: Record<string, string>;
}

export async function runPipeline(config: AppConfig, clock: RunClock): Promise<PipelineSummary> {
  const { applicationsRaw, lmsRaw } = await loadFeeds({
    applicationsPath: config.applicationsPath,
    lmsPath: config.lmsPath
  });

  const normalized = normalizeAndValidateDatasets({ applicationsRaw, lmsRaw, clock });

  await writeWorkStore(config.workDir, clock.processingDate, { applicationsRaw, normalized });

  log.info('Exporting outputs to CSV...');
  const outputs = await writeOutputTables(config.outputDir, buildOutputTables(normalized));

  const summary = {
    applicationsProcessed: normalized.applications.length,
    portfolioRows: normalized.portfolio.length,
    quarantinedApplications: normalized.qualityReport.quarantined_applications,
    outputs
  };
  log.info(
    `Done. cleaned_applications=${summary.applicationsProcessed} | loan_portfolio=${summary.portfolioRows}`
  );
  return summary;
}

interface Snapshot {
  day: string;
  portfolio: PortfolioRow[];
  qualityReport: DataQualityReport;
}

async function readLatestSnapshot(workDir: string): Promise<Snapshot> {
  const portfolioDay = await latestDatasetDateDir(workDir, DATASET_NAMES.loan_portfolio);
  const reportDay = await latestDatasetDateDir(workDir, DATASET_NAMES.data_quality_report);
  if (!portfolioDay || !reportDay) {
    throw new PipelineError(
      `No working-store snapshot found under ${workDir}. Run the pipeline first.`,
      'analyze',
      'SNAPSHOT_MISSING'
    );
  }
  if (portfolioDay !== reportDay) {
    log.warn('latest portfolio and quality report snapshots are from different days', {
      portfolioDay,
      reportDay
    });
  }

  const portfolio = await readDatasetJsonlForDate(workDir, DATASET_NAMES.loan_portfolio, portfolioDay, portfolioRowSchema);
  const [qualityReport] = await readDatasetJsonlForDate(
    workDir,
    DATASET_NAMES.data_quality_report,
    reportDay,
    dataQualityReportSchema
  );
  if (!qualityReport) {
    throw new PipelineError(`Quality report snapshot for ${reportDay} is empty.`, 'analyze', 'SNAPSHOT_MISSING');
  }

  return { day: portfolioDay, portfolio, qualityReport };
}

export async function runAnalyze(config: AppConfig): Promise<string[]> {
  const snapshot = await readLatestSnapshot(config.workDir);
  const tables = buildAnalyticsTables(snapshot.portfolio, snapshot.qualityReport.problematic_application_ids);
  const analyticsDir = path.join(config.outputDir, 'analytics');

  const files = tables.map((table) => ({
    filePath: path.join(analyticsDir, `${table.name}.csv`),
    content: renderCsv(table)
  }));
  await writeFilesAtomically(files);

  log.info('analytics written', {
    snapshot: snapshot.day,
    tables: Object.fromEntries(tables.map((table) => [table.name, table.rows.length])),
    analyticsDir
  });
  return files.map((file) => file.filePath);
}

export async function runExportExcel(config: AppConfig): Promise<string> {
  const snapshot = await readLatestSnapshot(config.workDir);
  const applicationsDay = await latestDatasetDateDir(config.workDir, DATASET_NAMES.cleaned_applications);
  const applications = applicationsDay
    ? await readDatasetJsonlForDate(config.workDir, DATASET_NAMES.cleaned_applications, applicationsDay, applicationSchema)
    : [];

  const output = buildOutputTables({
    applications,
    portfolio: snapshot.portfolio,
    qualityReport: snapshot.qualityReport
  });
  const outputPath = path.join(config.outputDir, `loan_portfolio_${snapshot.day}.xlsx`);

  await writeExcelFile({
    tables: [
      output.cleanedApplications,
      output.loanPortfolio,
      output.dataQualityReport,
      ...buildAnalyticsTables(snapshot.portfolio, snapshot.qualityReport.problematic_application_ids)
    ],
    outputPath
  });

  log.info('excel workbook written', { outputPath });
  return outputPath;
}
