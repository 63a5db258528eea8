import path from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { OUTPUT_FILES } from '../config/feeds.js';
import { PipelineError } from '../lib/errors.js';
import { writeFilesAtomically } from '../lib/fs.js';
import type { CellValue, Table } from './tables.js';

const PLAIN_DECIMAL = new Intl.NumberFormat('en-US', { useGrouping: false, maximumFractionDigits: 100 });

/** Numbers in plain decimal form; `String()` switches to exponent notation below 1e-6 and from 1e21. */
export function formatNumber(value: number): string {
  const text = String(value);
  return /e/i.test(text) ? PLAIN_DECIMAL.format(value) : text;
}

function renderCell(value: CellValue): string | null {
  if (value === null) {
    return null;
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'number') {
    return formatNumber(value);
  }
  return value;
}

/** Header row, every value quoted, nulls as empty fields. */
export function renderCsv(table: Table): string {
  const records = table.rows.map((row) => table.columns.map((column) => renderCell(row[column] ?? null)));
  return stringify(records, {
    header: true,
    columns: table.columns,
    quoted: true,
    delimiter: ','
  });
}

export async function writeOutputTables(
  outputDir: string,
  tables: { cleanedApplications: Table; loanPortfolio: Table; dataQualityReport: Table }
): Promise<Record<keyof typeof OUTPUT_FILES, string>> {
  const targets = {
    cleaned_applications: path.join(outputDir, OUTPUT_FILES.cleaned_applications),
    loan_portfolio: path.join(outputDir, OUTPUT_FILES.loan_portfolio),
    data_quality_report: path.join(outputDir, OUTPUT_FILES.data_quality_report)
  };

  try {
    await writeFilesAtomically([
      { filePath: targets.cleaned_applications, content: renderCsv(tables.cleanedApplications) },
      { filePath: targets.loan_portfolio, content: renderCsv(tables.loanPortfolio) },
      { filePath: targets.data_quality_report, content: renderCsv(tables.dataQualityReport) }
    ]);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PipelineError(`Failed to write outputs to ${outputDir}: ${reason}`, 'write', 'OUTPUT_WRITE_FAILED', {
      cause: error
    });
  }

  return targets;
}
