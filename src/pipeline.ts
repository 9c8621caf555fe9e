/**
 * Homework pipeline - orchestrates one document run
 * Flow: Extract → Order → Infer structure → Match elements → Answer per problem
 */

import {
  ContentOracle,
  Element,
  ElementExtractor,
  PipelineFailure,
  PipelineFailureKind,
  PipelineResult,
  PipelineStep,
  Problem,
  ProblemOutline,
  ProblemResult,
} from './types/index.js';
import { orderElements } from './elements.js';
import { inferStructure } from './structure.js';
import { matchProblemsWithElements } from './matching.js';
import { answerProblems } from './answering.js';
import { ProgressInfo } from './jobs.js';

export type OnProgressCallback = (progress: ProgressInfo) => void;

export interface PipelineOptions {
  answerConcurrency?: number;
}

const TOTAL_STEPS = 4;

const STEP_NAMES: Record<PipelineStep, string> = {
  1: 'Extracting elements',
  2: 'Inferring structure',
  3: 'Matching elements',
  4: 'Answering problems',
};

function failure(step: PipelineStep, kind: PipelineFailureKind, error: string): PipelineFailure {
  console.error(`[Pipeline] Step ${step} failed (${kind}): ${error}`);
  return { success: false, kind, error, step };
}

export class HomeworkPipeline {
  constructor(
    private readonly extractor: ElementExtractor,
    private readonly oracle: ContentOracle,
    private readonly options: Readonly<PipelineOptions> = {}
  ) {}

  /**
   * Run every stage for one document. Never rejects: empty stage outputs and
   * unexpected faults come back as `{ success: false, error, step }`.
   */
  async process(documentPath: string, onProgress?: OnProgressCallback): Promise<PipelineResult> {
    console.error(`[Pipeline] Processing ${documentPath}`);
    const emitProgress = (step: PipelineStep, note?: string) => {
      onProgress?.({ currentStep: STEP_NAMES[step], stepNumber: step, totalSteps: TOTAL_STEPS, note });
    };

    // Step 1: extraction + reading order
    emitProgress(1);
    let elements: Element[];
    try {
      elements = orderElements(await this.extractor.extract(documentPath));
    } catch (error) {
      return failure(1, 'StageFault', describe(error));
    }
    if (elements.length === 0) {
      return failure(1, 'ExtractionEmpty', 'No elements could be extracted from the document');
    }

    // Step 2: problem hierarchy
    emitProgress(2, `${elements.length} elements`);
    let outlines: ProblemOutline[];
    try {
      outlines = await inferStructure(this.oracle, elements);
    } catch (error) {
      return failure(2, 'StageFault', describe(error));
    }
    if (outlines.length === 0) {
      return failure(2, 'StructureEmpty', 'No questions were recognized in the document');
    }

    // Step 3: attach elements
    emitProgress(3, `${outlines.length} problems`);
    let problems: Problem[];
    try {
      problems = matchProblemsWithElements(outlines, elements);
    } catch (error) {
      return failure(3, 'StageFault', describe(error));
    }
    if (problems.length === 0) {
      return failure(3, 'MatchingEmpty', 'No problem kept any subquestion after matching');
    }

    // Step 4: one oracle call per problem
    emitProgress(4, `${problems.length} problems`);
    let results: ProblemResult[];
    try {
      results = await answerProblems(this.oracle, problems, this.options.answerConcurrency ?? 1);
    } catch (error) {
      return failure(4, 'StageFault', describe(error));
    }

    console.error(`[Pipeline] Done: ${elements.length} elements, ${problems.length} problems`);
    return {
      success: true,
      totalElements: elements.length,
      totalProblems: problems.length,
      results,
    };
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
