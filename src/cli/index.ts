#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig } from '../config/env.js';
import { log, setLogLevel } from '../lib/log.js';
import { createRunClock } from '../lib/time.js';
import { runAnalyze, runExportExcel, runPipeline } from './commands.js';

function configure() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return config;
}

async function runCommand(): Promise<void> {
  const summary = await runPipeline(configure(), createRunClock());
  console.log(
    `Applications processed: ${summary.applicationsProcessed} | Portfolio rows: ${summary.portfolioRows}`
  );
}

async function analyzeCommand(): Promise<void> {
  await runAnalyze(configure());
}

async function exportExcelCommand(): Promise<void> {
  await runExportExcel(configure());
}

const program = new Command();
program
  .name('portfolio-etl')
  .description('Validate application and loan-servicing feeds into a loan portfolio with a data-quality report')
  .version('0.1.0');

program
  .command('run')
  .description('Load both feeds, validate, join, and write cleaned_applications, loan_portfolio and data_quality_report')
  .action(runCommand);
program
  .command('analyze')
  .description('Write portfolio analytics views from the latest working-store snapshot')
  .action(analyzeCommand);
program
  .command('export:excel')
  .description('Write the latest run and its analytics views to one Excel workbook')
  .action(exportExcelCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  log.error('command failed', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
