import { DATASET_NAMES } from '../config/feeds.js';
import type { RawRecord } from '../ingress/rawRecord.js';
import { writeJsonl } from '../lib/fs.js';
import { datasetSnapshotPath } from '../normalize/io.js';
import type { NormalizedWithQuality } from '../normalize/normalizeDatasets.js';

/**
 * Snapshots every intermediate table of a run as JSONL. The working store is for inspection and
 * for the `analyze` and `export:excel` commands; it is not one of the run's artifacts.
 */
export async function writeWorkStore(
  workDir: string,
  day: string,
  input: { applicationsRaw: readonly RawRecord[]; normalized: NormalizedWithQuality }
): Promise<void> {
  const { normalized } = input;
  const snapshots: Array<[string, unknown[]]> = [
    [DATASET_NAMES.raw_applications, [...input.applicationsRaw]],
    [DATASET_NAMES.quarantined_applications, normalized.quarantinedApplications],
    [DATASET_NAMES.cleaned_applications, normalized.applications],
    [DATASET_NAMES.lms_cleaned, normalized.lmsRecords],
    [DATASET_NAMES.loan_portfolio, normalized.portfolio],
    [DATASET_NAMES.data_quality_report, [normalized.qualityReport]],
    [DATASET_NAMES.data_quality_issues, normalized.qualityIssues]
  ];

  for (const [dataset, records] of snapshots) {
    await writeJsonl(datasetSnapshotPath(workDir, dataset, day), records);
  }
}
