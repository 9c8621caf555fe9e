import { writeFile, readFile, mkdir } from 'fs/promises';
import { join, resolve } from 'path';
import { PipelineResult } from './types/index.js';

// Structured progress so status checks can report the current stage
export interface ProgressInfo {
  currentStep: string;
  stepNumber: number;
  totalSteps: number;
  note?: string;
}

export interface HomeworkJob {
  id: string;
  status: 'pending' | 'running' | 'completed' | 'failed';
  documentPath: string;        // path the document was submitted under
  createdAt: number;
  completedAt?: number;
  result?: PipelineResult;
  error?: string;              // unexpected fault (file moves, persistence)
  progress?: string | ProgressInfo;
  resultPath?: string;         // <stem>_result.json
  archivedPath?: string;       // document location after the run
}

export class DocumentBusyError extends Error {
  constructor(
    public readonly documentPath: string,
    public readonly jobId: string
  ) {
    super(`Document is already being processed by job ${jobId}: ${documentPath}`);
    this.name = 'DocumentBusyError';
  }
}

/**
 * Generate unique job ID
 */
export function generateJobId(): string {
  return `homework-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Save job to file system
 */
export async function saveJob(job: HomeworkJob, jobsDir: string): Promise<void> {
  try {
    await mkdir(jobsDir, { recursive: true });
    await writeFile(join(jobsDir, `${job.id}.json`), JSON.stringify(job, null, 2), 'utf-8');
  } catch (error) {
    console.error(`[Jobs] Failed to save job ${job.id}:`, error);
  }
}

/**
 * Load job from file system
 */
export async function loadJob(jobId: string, jobsDir: string): Promise<HomeworkJob | null> {
  try {
    const data: unknown = JSON.parse(await readFile(join(jobsDir, `${jobId}.json`), 'utf-8'));
    return isHomeworkJob(data) ? data : null;
  } catch {
    return null;
  }
}

function isHomeworkJob(value: unknown): value is HomeworkJob {
  return (
    typeof value === 'object' && value !== null &&
    'id' in value && typeof value.id === 'string' &&
    'status' in value && typeof value.status === 'string' &&
    'documentPath' in value && typeof value.documentPath === 'string' &&
    'createdAt' in value && typeof value.createdAt === 'number'
  );
}

/**
 * In-memory job table with file persistence.
 * Guarantees at most one active job per document (keyed by absolute path).
 */
export class JobRegistry {
  private readonly jobs = new Map<string, HomeworkJob>();
  private readonly activeDocuments = new Map<string, string>();
  private readonly pendingWrites = new Map<string, Promise<void>>();

  constructor(private readonly jobsDir: string) {}

  /**
   * Register a pending job for a document.
   * Throws DocumentBusyError while another job holds the same document.
   */
  claim(documentPath: string): HomeworkJob {
    const key = resolve(documentPath);
    const activeId = this.activeDocuments.get(key);
    if (activeId) {
      throw new DocumentBusyError(key, activeId);
    }

    const job: HomeworkJob = {
      id: generateJobId(),
      status: 'pending',
      documentPath: key,
      createdAt: Date.now(),
      progress: 'Queued',
    };
    this.jobs.set(job.id, job);
    this.activeDocuments.set(key, job.id);
    console.error(`[Jobs] Created job ${job.id} for ${key}`);
    return job;
  }

  release(job: HomeworkJob): void {
    if (this.activeDocuments.get(job.documentPath) === job.id) {
      this.activeDocuments.delete(job.documentPath);
    }
  }

  isActive(documentPath: string): boolean {
    return this.activeDocuments.has(resolve(documentPath));
  }

  /**
   * Look up a job in memory, then on disk (handles server restarts)
   */
  async find(jobId: string): Promise<HomeworkJob | null> {
    const cached = this.jobs.get(jobId);
    if (cached) return cached;

    const fileJob = await loadJob(jobId, this.jobsDir);
    if (fileJob) {
      this.jobs.set(jobId, fileJob);
      console.error(`[Jobs] Loaded job ${jobId} from file`);
    }
    return fileJob;
  }

  /**
   * Writes for one job are chained so a late progress save can never
   * overwrite the final state.
   */
  save(job: HomeworkJob): Promise<void> {
    const previous = this.pendingWrites.get(job.id) ?? Promise.resolve();
    const write = previous.then(() => saveJob(job, this.jobsDir));
    this.pendingWrites.set(job.id, write);
    return write.finally(() => {
      if (this.pendingWrites.get(job.id) === write) this.pendingWrites.delete(job.id);
    });
  }
}
