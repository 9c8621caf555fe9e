#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { HttpContentOracle } from './clients/llm.js';
import { PdfElementExtractor } from './clients/pdf.js';
import { HomeworkPipeline } from './pipeline.js';
import { DocumentBusyError, HomeworkJob, JobRegistry } from './jobs.js';
import { HomeworkServices, startHomeworkJob } from './job-orchestrator.js';
import { ensureFolders, FolderWatcher, isSupportedDocument, watchHomeworkFolder } from './watcher.js';
import { listResults } from './storage/result-store.js';
import { formatJobStatus } from './formatting.js';

// Note: process.env is populated by the MCP client at runtime from mcp.json
const config = loadConfig(process.env);

const services: HomeworkServices = {
  registry: new JobRegistry(config.folders.jobs),
  pipeline: new HomeworkPipeline(
    new PdfElementExtractor(config.images),
    new HttpContentOracle(config.oracle, config.retry),
    { answerConcurrency: config.answerConcurrency }
  ),
  folders: config.folders,
};

let folderWatcher: FolderWatcher | null = null;

// Create the MCP server
const server = new McpServer({
  name: 'homework-solver-mcp',
  version: '1.0.0',
});

function textResult(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

server.registerTool(
  'process_homework',
  {
    title: 'Solve a Homework Document (Async)',
    description: `Starts processing a homework PDF: extracts its text and images, recognizes problems and subquestions, and asks the configured vision model for an answer to every subquestion.

**Flow:**
1. The document is moved into the processing folder
2. Problems/subquestions are recognized (pattern fallback if the model reply is unusable)
3. Each problem is answered with one model call
4. \`<name>_result.json\` is written to the results folder and the document is archived there

Only one job per document may run at a time. Poll \`check_homework_status\` with the returned job_id.`,
    inputSchema: {
      document_path: z.string().describe('Absolute or working-directory-relative path to the PDF. Example: "/data/homework/week3.pdf"'),
    },
  },
  async ({ document_path }) => {
    if (!isSupportedDocument(document_path)) {
      return textResult(`Unsupported document type: ${document_path}. Only .pdf files are processed.`);
    }

    try {
      const job = startHomeworkJob(document_path, services);
      await services.registry.save(job);
      return textResult(JSON.stringify({
        job_id: job.id,
        status: job.status,
        document_path: job.documentPath,
        next_action: 'Call check_homework_status with this job_id until status is "completed" or "failed".',
      }, null, 2));
    } catch (error) {
      if (error instanceof DocumentBusyError) {
        return textResult(JSON.stringify({ error: error.message, job_id: error.jobId }, null, 2));
      }
      throw error;
    }
  }
);

server.registerTool(
  'check_homework_status',
  {
    title: 'Check Homework Job Status',
    description: `Check the status of a job started with process_homework.

**Status values:**
- pending: Job is queued
- running: Pipeline is in progress (current step is reported)
- completed: Pipeline finished; a summary per problem is returned by default
- failed: Unexpected fault (file move or persistence), error is included

A completed job may still carry a pipeline failure ({error, step}) when the document had no extractable content or no recognizable questions.

Set full=true to return the complete result JSON with every answer.`,
    inputSchema: {
      job_id: z.string().describe('The job_id returned from process_homework'),
      full: z.boolean().optional().describe('Return the complete result JSON instead of the summary'),
    },
  },
  async ({ job_id, full }) => {
    const job: HomeworkJob | null = await services.registry.find(job_id);
    if (!job) {
      return textResult(`Job ${job_id} not found`);
    }

    if (full && job.result) {
      return textResult(JSON.stringify(job.result, null, 2));
    }
    return textResult(formatJobStatus(job));
  }
);

server.registerTool(
  'list_homework_results',
  {
    title: 'List Homework Results',
    description: 'Lists the most recent result files in the results folder, newest first.',
    inputSchema: {
      limit: z.number().int().min(1).max(100).optional().describe('Maximum number of results (default 20)'),
    },
  },
  async ({ limit }) => {
    const results = await listResults(config.folders.results, limit ?? 20);
    if (results.length === 0) {
      return textResult('No homework results available.');
    }
    return textResult(results.map((r, i) => `${i + 1}. [${r.modifiedAt.slice(0, 19)}] ${r.name}\n   Path: ${r.path}`).join('\n'));
  }
);

function startWatcher(): void {
  folderWatcher = watchHomeworkFolder(config.folders, config.settleDelayMs, (documentPath) => {
    if (services.registry.isActive(documentPath)) return;
    try {
      startHomeworkJob(documentPath, services);
    } catch (error) {
      if (!(error instanceof DocumentBusyError)) throw error;
      console.error(`[Watcher] ${error.message}`);
    }
  });
}

// Start the server
async function main() {
  console.error('[Homework MCP] Starting server...');
  console.error(`[Homework MCP] Oracle: ${config.oracle.provider}/${config.oracle.model}`);
  if (!config.oracle.apiKey) {
    console.error('[Homework MCP] WARNING: ORACLE_API_KEY is not set, every oracle call will fail');
  }

  if (config.watch) {
    await ensureFolders(config.folders);
    startWatcher();
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('[Homework MCP] Server ready on stdio');
  console.error('[Homework MCP] Available tools: process_homework, check_homework_status, list_homework_results');

  const shutdown = async () => {
    console.error('\n[Homework MCP] Shutting down...');
    folderWatcher?.close();
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((error) => console.error('[Homework MCP] Shutdown error:', error));
  });
  process.on('SIGTERM', () => {
    shutdown().catch((error) => console.error('[Homework MCP] Shutdown error:', error));
  });
}

main().catch((error) => {
  console.error('[Homework MCP] Fatal error:', error);
  process.exit(1);
});
