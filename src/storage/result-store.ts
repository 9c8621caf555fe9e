import { access, mkdir, readdir, rename, stat, writeFile } from 'fs/promises';
import { basename, dirname, extname, join, resolve } from 'path';
import { PipelineResult } from '../types/index.js';

export interface ResultFileInfo {
  path: string;
  name: string;
  modifiedAt: string;
}

const RESULT_SUFFIX = '_result.json';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Destination for a file in `dir`; a taken name gets a `_<timestamp>` suffix
 */
export async function uniqueDestination(dir: string, fileName: string, now: Date = new Date()): Promise<string> {
  const target = join(dir, fileName);
  if (!(await exists(target))) return target;

  const extension = extname(fileName);
  const stem = basename(fileName, extension);
  return join(dir, `${stem}_${formatTimestamp(now)}${extension}`);
}

export function resultFileName(documentPath: string): string {
  return `${basename(documentPath, extname(documentPath))}${RESULT_SUFFIX}`;
}

/**
 * Write `<stem>_result.json` next to the archived documents
 */
export async function saveResult(resultsDir: string, documentPath: string, result: PipelineResult): Promise<string> {
  await mkdir(resultsDir, { recursive: true });
  const resultPath = join(resultsDir, resultFileName(documentPath));
  await writeFile(resultPath, JSON.stringify(result, null, 2), 'utf-8');
  console.error(`[Results] Saved ${resultPath}`);
  return resultPath;
}

/**
 * Move a document into `dir`, avoiding name clashes.
 * A document already in `dir` stays where it is.
 */
export async function moveDocument(documentPath: string, dir: string): Promise<string> {
  const source = resolve(documentPath);
  if (dirname(source) === resolve(dir)) return source;

  await mkdir(dir, { recursive: true });
  const destination = await uniqueDestination(dir, basename(source));
  await rename(source, destination);
  return destination;
}

/**
 * Most recent result files first
 */
export async function listResults(resultsDir: string, limit: number = 20): Promise<ResultFileInfo[]> {
  let files: string[];
  try {
    files = await readdir(resultsDir);
  } catch {
    return [];
  }

  const entries = await Promise.all(
    files
      .filter((name) => name.endsWith(RESULT_SUFFIX))
      .map(async (name) => {
        const path = join(resultsDir, name);
        const info = await stat(path);
        return { path, name, modifiedAt: info.mtime.toISOString() };
      })
  );

  return entries.sort((a, b) => b.modifiedAt.localeCompare(a.modifiedAt)).slice(0, limit);
}
