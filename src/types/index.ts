export type ElementKind = 'text' | 'image' | 'page_image';

/** left, top, right, bottom in page coordinates */
export type BoundingBox = readonly [left: number, top: number, right: number, bottom: number];

/**
 * One atomic piece of page evidence.
 * Built through `createElement` so `verticalCenter` always matches `boundingBox`.
 */
export interface Element {
  readonly kind: ElementKind;
  readonly content: string;            // UTF-8 text, or base64 JPEG for image kinds
  readonly boundingBox: BoundingBox;
  readonly pageNumber: number;         // 1-based
  readonly verticalCenter: number;
}

/**
 * Page reference as declared by the oracle. Usually a number, but free-form
 * tokens ("2-3", "ii") are carried through verbatim.
 */
export type PageToken = number | string;

/**
 * Flat question fragment from the pattern fallback or a legacy `questions` payload
 */
export interface QuestionFragment {
  id: string;
  text: string;
  relatedElementIndices: number[];
  pages?: PageToken[];   // absent: inferred as page 1; empty: no page window
}

export type SubquestionOutline = QuestionFragment;

/**
 * Problem as declared by the oracle or synthesized by prefix grouping,
 * before any element is resolved.
 */
export interface ProblemOutline {
  id?: string;
  text: string;
  relatedElementIndices: number[];
  pages: PageToken[];
  subquestions: SubquestionOutline[];
}

export interface Subquestion {
  readonly id: string;
  readonly text: string;
  readonly images: readonly string[];
  readonly pageNumbers: readonly PageToken[];
  readonly relatedElements: readonly Element[];
}

export interface Problem {
  readonly id: string;
  readonly text: string;
  readonly pageNumbers: readonly PageToken[];
  readonly relatedElements: readonly Element[];   // own + every subquestion's, first-seen order
  readonly subquestions: readonly Subquestion[];
}

export interface AnswerRecord {
  problemId: string;
  subquestionId: string | null;
  subquestionText: string;
  subquestionImages: readonly string[];
  answerText: string;
  reasoningText: string;
}

export interface ProblemResult {
  problemId: string;
  problemText: string;
  subquestionCount: number;
  answers: AnswerRecord[];
}

/**
 * 1 = extraction, 2 = structure inference, 3 = matching, 4 = aggregation
 */
export type PipelineStep = 1 | 2 | 3 | 4;

export type PipelineFailureKind = 'ExtractionEmpty' | 'StructureEmpty' | 'MatchingEmpty' | 'StageFault';

export interface PipelineSuccess {
  success: true;
  totalElements: number;
  totalProblems: number;
  results: ProblemResult[];
}

export interface PipelineFailure {
  success: false;
  kind: PipelineFailureKind;
  error: string;
  step: PipelineStep;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

/**
 * One turn of multimodal content sent to the oracle
 */
export type ContentTurn =
  | { type: 'text'; text: string }
  | { type: 'image'; data: string; mimeType: string };

export interface OracleResponse {
  model: string;
  content: string;
  error?: string;   // set when every attempt failed; content then holds the sentinel text
}

export interface ContentOracle {
  complete(systemPrompt: string, turns: ContentTurn[]): Promise<OracleResponse>;
}

export interface ElementExtractor {
  /** Resolves to an empty list when the document cannot be read. */
  extract(documentPath: string): Promise<Element[]>;
}
