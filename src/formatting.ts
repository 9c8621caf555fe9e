/**
 * Format job status and pipeline results as plain text for tool replies
 */

import { HomeworkJob, ProgressInfo } from './jobs.js';
import { PipelineResult } from './types/index.js';

const PREVIEW_LENGTH = 80;

function preview(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH)}...` : flat;
}

export function formatProgress(progress: string | ProgressInfo | undefined): string {
  if (progress === undefined) return '';
  if (typeof progress === 'string') return progress;
  const note = progress.note ? ` (${progress.note})` : '';
  return `Step ${progress.stepNumber}/${progress.totalSteps}: ${progress.currentStep}${note}`;
}

/**
 * Per-problem summary: answered/total subquestions and a short preview of each answer
 */
export function formatResultSummary(result: PipelineResult): string {
  if (!result.success) {
    return `Pipeline stopped at step ${result.step} (${result.kind}): ${result.error}`;
  }

  const lines: string[] = [
    `Elements: ${result.totalElements}`,
    `Problems: ${result.totalProblems}`,
    '',
  ];

  for (const problem of result.results) {
    const answered = problem.answers.filter((a) => a.answerText.trim() !== '').length;
    lines.push(`Problem ${problem.problemId}: ${answered}/${problem.subquestionCount} answered`);
    for (const answer of problem.answers) {
      const label = answer.subquestionId ?? '-';
      lines.push(`  [${label}] ${answer.answerText ? preview(answer.answerText) : '(no answer)'}`);
    }
  }

  return lines.join('\n');
}

export function formatJobStatus(job: HomeworkJob): string {
  const lines: string[] = [
    `Job: ${job.id}`,
    `Status: ${job.status}`,
    `Document: ${job.documentPath}`,
  ];

  const progress = formatProgress(job.progress);
  if (progress) lines.push(`Progress: ${progress}`);

  if (job.completedAt) {
    lines.push(`Duration: ${((job.completedAt - job.createdAt) / 1000).toFixed(1)}s`);
  }
  if (job.error) lines.push(`Error: ${job.error}`);
  if (job.resultPath) lines.push(`Result file: ${job.resultPath}`);
  if (job.archivedPath) lines.push(`Archived document: ${job.archivedPath}`);

  if (job.result) {
    lines.push('', formatResultSummary(job.result));
  }

  return lines.join('\n');
}
