import { basename } from 'path';
import { HomeworkJob, JobRegistry, ProgressInfo } from './jobs.js';
import { HomeworkPipeline, OnProgressCallback } from './pipeline.js';
import { moveDocument, saveResult } from './storage/result-store.js';
import type { FolderConfig } from './config.js';

export interface HomeworkServices {
  registry: JobRegistry;
  pipeline: HomeworkPipeline;
  folders: Readonly<FolderConfig>;
}

/**
 * Claim the document and run it in the background.
 * Throws DocumentBusyError when the document already has an active job.
 */
export function startHomeworkJob(documentPath: string, services: HomeworkServices): HomeworkJob {
  const job = services.registry.claim(documentPath);

  // Fire off execution in background (don't await)
  runHomeworkJob(job, services).catch((error) => {
    console.error(`[Jobs] Job ${job.id} crashed:`, error);
  });

  return job;
}

/**
 * Flow for a claimed job:
 * 1. Move the document into the processing folder
 * 2. Run the pipeline
 * 3. Write <stem>_result.json into the results folder
 * 4. Move the document into the results folder
 */
export async function runHomeworkJob(job: HomeworkJob, services: HomeworkServices): Promise<HomeworkJob> {
  const { registry, pipeline, folders } = services;

  try {
    job.status = 'running';
    job.progress = 'Moving document to processing folder';
    await registry.save(job);

    const processingPath = await moveDocument(job.documentPath, folders.processing);

    // Progress callback updates the job in real time
    const onProgress: OnProgressCallback = (progress: ProgressInfo) => {
      job.progress = progress;
      registry.save(job).catch((err) => console.error(`[Jobs] Failed to save progress:`, err));
    };

    const result = await pipeline.process(processingPath, onProgress);
    job.result = result;
    job.resultPath = await saveResult(folders.results, processingPath, result);
    job.archivedPath = await moveDocument(processingPath, folders.results);

    job.status = 'completed';
    job.completedAt = Date.now();
    job.progress = result.success ? 'Complete' : `Stopped at step ${result.step}: ${result.error}`;
    console.error(`[Jobs] Job ${job.id} completed (${basename(job.archivedPath)})`);
  } catch (error) {
    job.status = 'failed';
    job.completedAt = Date.now();
    job.error = error instanceof Error ? error.message : String(error);
    job.progress = 'Failed';
    console.error(`[Jobs] Job ${job.id} failed:`, job.error);
  } finally {
    registry.release(job);
  }

  await registry.save(job);
  return job;
}
