import { access, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export async function readText(filePath: string): Promise<string> {
  return readFile(filePath, 'utf8');
}

export async function writeJsonl(filePath: string, records: unknown[]): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const content = records.map((record) => JSON.stringify(record)).join('\n');
  await writeFile(filePath, content.length > 0 ? `${content}\n` : '', 'utf8');
}

export async function readJsonl(filePath: string): Promise<unknown[]> {
  const content = await readFile(filePath, 'utf8');
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line));
}

/**
 * Writes every file to a temporary sibling first and renames them into place only once all
 * temporary files exist. A file being replaced is moved to a backup sibling until every rename
 * has succeeded; if one fails, the files already placed are rolled back to their previous
 * content (or removed when they are new) and the error is rethrown. A crash mid-rename can
 * still leave `.tmp` and `.bak` siblings behind.
 */
export async function writeFilesAtomically(
  files: Array<{ filePath: string; content: string }>
): Promise<void> {
  const staged = files.map((file) => ({
    ...file,
    tempPath: `${file.filePath}.${process.pid}.tmp`,
    backupPath: `${file.filePath}.${process.pid}.bak`
  }));

  try {
    for (const file of staged) {
      await ensureDir(path.dirname(file.filePath));
      await writeFile(file.tempPath, file.content, 'utf8');
    }
  } catch (error) {
    await Promise.all(staged.map((file) => rm(file.tempPath, { force: true })));
    throw error;
  }

  const backedUp = new Set<string>();
  const placed = new Set<string>();
  try {
    for (const file of staged) {
      if (await fileExists(file.filePath)) {
        await rename(file.filePath, file.backupPath);
        backedUp.add(file.filePath);
      }
      await rename(file.tempPath, file.filePath);
      placed.add(file.filePath);
    }
  } catch (error) {
    for (const file of staged) {
      if (placed.has(file.filePath)) {
        await rm(file.filePath, { force: true });
      }
      if (backedUp.has(file.filePath)) {
        await rename(file.backupPath, file.filePath);
      }
      await rm(file.tempPath, { force: true });
    }
    throw error;
  }

  await Promise.all(staged.map((file) => rm(file.backupPath, { force: true })));
}

export async function listSubdirs(dirPath: string): Promise<string[]> {
  try {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
}

export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort();
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
}
