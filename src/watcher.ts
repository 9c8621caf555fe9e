import { watch, type FSWatcher } from 'fs';
import { mkdir, stat } from 'fs/promises';
import { extname, join } from 'path';
import type { FolderConfig } from './config.js';

export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set(['.pdf']);

export interface FolderWatcher {
  close: () => void;
}

export function isSupportedDocument(fileName: string): boolean {
  return SUPPORTED_EXTENSIONS.has(extname(fileName).toLowerCase());
}

/**
 * Create the homework, results and processing folders
 */
export async function ensureFolders(folders: Readonly<FolderConfig>): Promise<void> {
  for (const dir of [folders.homework, folders.results, folders.processing]) {
    await mkdir(dir, { recursive: true });
  }
  console.error(`[Watcher] Homework folder: ${folders.homework}`);
  console.error(`[Watcher] Results folder: ${folders.results}`);
  console.error(`[Watcher] Processing folder: ${folders.processing}`);
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Watch the homework folder (non-recursive) for new or dropped-in documents.
 * Each candidate waits `settleDelayMs` so the copy can finish, and is handed
 * over only if it still exists. Repeated events for one file inside the
 * settle window are coalesced.
 */
export function watchHomeworkFolder(
  folders: Readonly<FolderConfig>,
  settleDelayMs: number,
  onDocument: (documentPath: string) => void
): FolderWatcher {
  const pending = new Map<string, NodeJS.Timeout>();

  const watcher: FSWatcher = watch(folders.homework, { persistent: true }, (_event, fileName) => {
    if (!fileName || !isSupportedDocument(fileName)) return;

    const documentPath = join(folders.homework, fileName);
    const existing = pending.get(documentPath);
    if (existing) clearTimeout(existing);

    pending.set(documentPath, setTimeout(() => {
      pending.delete(documentPath);
      isFile(documentPath)
        .then((present) => {
          if (!present) return;
          console.error(`[Watcher] New document: ${fileName}`);
          onDocument(documentPath);
        })
        .catch((error) => console.error(`[Watcher] Failed to inspect ${documentPath}:`, error));
    }, settleDelayMs));
  });

  watcher.on('error', (error) => console.error('[Watcher] Watch error:', error));
  console.error(`[Watcher] Watching ${folders.homework}`);

  return {
    close: () => {
      for (const timer of pending.values()) clearTimeout(timer);
      pending.clear();
      watcher.close();
    },
  };
}
