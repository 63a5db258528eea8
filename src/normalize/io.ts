import path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { listFiles, listSubdirs, readJsonl } from '../lib/fs.js';

export async function latestDatasetDateDir(baseDir: string, dataset: string): Promise<string | null> {
  const dirs = await listSubdirs(path.join(baseDir, dataset));
  return dirs.length === 0 ? null : dirs[dirs.length - 1] ?? null;
}

export async function readDatasetJsonlForDate<T>(
  baseDir: string,
  dataset: string,
  dateDir: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T[]> {
  const targetDir = path.join(baseDir, dataset, dateDir);
  const files = await listFiles(targetDir);
  const jsonlFiles = files.filter((file) => file.endsWith('.jsonl'));

  const all: T[] = [];
  for (const file of jsonlFiles) {
    const records = await readJsonl(path.join(targetDir, file));
    all.push(...records.map((record) => schema.parse(record)));
  }

  return all;
}

export function datasetSnapshotPath(baseDir: string, dataset: string, dateDir: string): string {
  return path.join(baseDir, dataset, dateDir, 'records.jsonl');
}
