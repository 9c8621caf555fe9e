import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat, unlink, writeFile } from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ensureFolders, FolderWatcher, isSupportedDocument, watchHomeworkFolder } from '../watcher.js';
import { FolderConfig } from '../config.js';

describe('isSupportedDocument', () => {
  it('accepts PDFs regardless of case', () => {
    expect(isSupportedDocument('week1.pdf')).toBe(true);
    expect(isSupportedDocument('/a/b/WEEK1.PDF')).toBe(true);
    expect(isSupportedDocument('notes.txt')).toBe(false);
    expect(isSupportedDocument('pdf')).toBe(false);
  });
});

describe('folder watching', () => {
  let root: string;
  let folders: FolderConfig;
  let watcher: FolderWatcher | null = null;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'homework-watch-'));
    folders = {
      homework: join(root, 'homework'),
      results: join(root, 'homework', 'results'),
      processing: join(root, 'homework', 'processing'),
      jobs: join(root, 'homework', '.jobs'),
    };
    await ensureFolders(folders);
  });

  afterEach(async () => {
    watcher?.close();
    watcher = null;
    await rm(root, { recursive: true, force: true });
  });

  it('creates the homework, results and processing folders', async () => {
    for (const dir of [folders.homework, folders.results, folders.processing]) {
      expect((await stat(dir)).isDirectory()).toBe(true);
    }
  });

  it('reports a settled PDF once and ignores other files', async () => {
    const onDocument = vi.fn();
    watcher = watchHomeworkFolder(folders, 50, onDocument);

    await writeFile(join(folders.homework, 'notes.txt'), 'x');
    await writeFile(join(folders.homework, 'week1.pdf'), 'pdf');
    await writeFile(join(folders.homework, 'week1.pdf'), 'pdf, rewritten');

    await vi.waitFor(() => expect(onDocument).toHaveBeenCalled(), { timeout: 2000 });
    await sleep(150);
    expect(onDocument).toHaveBeenCalledTimes(1);
    expect(onDocument).toHaveBeenCalledWith(join(folders.homework, 'week1.pdf'));
  });

  it('skips a file removed before it settled', async () => {
    const onDocument = vi.fn();
    watcher = watchHomeworkFolder(folders, 100, onDocument);

    await writeFile(join(folders.homework, 'temp.pdf'), 'pdf');
    await unlink(join(folders.homework, 'temp.pdf'));
    await sleep(300);
    expect(onDocument).not.toHaveBeenCalled();
  });
});
