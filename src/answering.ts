/**
 * Answer aggregation - one oracle call per problem, answers aligned back onto
 * the problem's subquestions.
 *
 * Output always holds exactly one record per subquestion, in subquestion
 * order, whatever the oracle returned.
 */

import { z } from 'zod';
import {
  AnswerRecord,
  ContentOracle,
  ContentTurn,
  Problem,
  ProblemResult,
  Subquestion,
} from './types/index.js';
import { isImageElement } from './elements.js';
import { extractJson, isJsonObject } from './json-extraction.js';

export const ANSWER_SYSTEM_PROMPT = [
  'You are a professional homework tutor.',
  'Using the problem stem, answer every subquestion in turn and give detailed steps and reasoning for each.',
  'Important: finish by returning strictly JSON in this shape:',
  '{"problem_id":"1","problem_text":"problem stem (if any)","answers":[{"sub_id":"1(a)","answer":"...","reason":"..."}]}',
  'Do not add any other commentary; put derivations in the reason field.',
].join('\n');

export interface OracleAnswer {
  subId?: string;
  answer: string;
  reason: string;
}

export type AnswerPayload =
  | { kind: 'Answers'; problemText?: string; answers: OracleAnswer[] }
  | { kind: 'Unparseable'; reason: string; raw: string };

function stringifyField(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value === null || value === undefined) return '';
  return JSON.stringify(value);
}

const answerSchema = z.object({
  sub_id: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
  answer: z.unknown().transform(stringifyField),
  reason: z.unknown().transform(stringifyField),
});

/**
 * Decode an answer reply. Valid JSON that is not an object yields an empty
 * answer list rather than the degraded path.
 */
export function decodeAnswerPayload(raw: string): AnswerPayload {
  if (!raw.trim()) {
    return { kind: 'Unparseable', reason: 'Empty response', raw };
  }

  const extraction = extractJson(raw);
  if (!extraction.ok) {
    return { kind: 'Unparseable', reason: extraction.message, raw };
  }
  if (!isJsonObject(extraction.value)) {
    return { kind: 'Answers', answers: [] };
  }

  const { problem_text: problemText, answers } = extraction.value;
  const decoded: OracleAnswer[] = [];
  if (Array.isArray(answers)) {
    for (const entry of answers) {
      const parsed = answerSchema.safeParse(entry);
      // Non-object entries still occupy their position
      decoded.push(
        parsed.success
          ? { subId: parsed.data.sub_id, answer: parsed.data.answer, reason: parsed.data.reason }
          : { answer: '', reason: '' }
      );
    }
  }

  return {
    kind: 'Answers',
    problemText: typeof problemText === 'string' ? problemText : undefined,
    answers: decoded,
  };
}

export function buildAnswerTurns(problem: Problem): ContentTurn[] {
  const turns: ContentTurn[] = [];
  if (problem.text.trim()) {
    turns.push({ type: 'text', text: `Stem (problem ${problem.id}):\n${problem.text}` });
  }
  for (const sub of problem.subquestions) {
    turns.push({ type: 'text', text: `Subquestion ${sub.id}:\n${sub.text}` });
  }
  for (const element of problem.relatedElements) {
    if (isImageElement(element)) {
      turns.push({ type: 'image', data: element.content, mimeType: 'image/jpeg' });
    }
  }
  return turns;
}

function toRecord(problemId: string, sub: Subquestion, answerText: string, reasoningText: string): AnswerRecord {
  return {
    problemId,
    subquestionId: sub.id || null,
    subquestionText: sub.text,
    subquestionImages: sub.images,
    answerText,
    reasoningText,
  };
}

/**
 * Align decoded answers onto subquestions: by `sub_id` first, then by
 * position. Subquestions left unanswered get empty records.
 */
export function alignAnswers(problem: Problem, payload: AnswerPayload): ProblemResult {
  const subs = problem.subquestions;

  if (payload.kind === 'Unparseable') {
    return {
      problemId: problem.id,
      problemText: problem.text,
      subquestionCount: subs.length,
      answers: subs.map((sub) => toRecord(problem.id, sub, payload.raw, '')),
    };
  }

  const slots: Array<AnswerRecord | undefined> = new Array(subs.length).fill(undefined);

  payload.answers.forEach((answer, index) => {
    const subId = answer.subId || subs[index]?.id;
    let target = subId ? subs.findIndex((sub) => sub.id === subId) : -1;
    if (target === -1 && index < subs.length) target = index;

    if (target === -1) {
      console.error(`[Answers] Problem ${problem.id}: dropping answer for unknown subquestion "${subId ?? ''}"`);
      return;
    }
    if (slots[target]) {
      console.error(`[Answers] Problem ${problem.id}: duplicate answer for ${subs[target].id}, keeping the first`);
      return;
    }
    slots[target] = toRecord(problem.id, subs[target], answer.answer, answer.reason);
  });

  const overrideText = payload.problemText?.trim() ? payload.problemText : undefined;

  return {
    problemId: problem.id,
    problemText: overrideText ?? problem.text,
    subquestionCount: subs.length,
    answers: subs.map((sub, index) => slots[index] ?? toRecord(problem.id, sub, '', '')),
  };
}

export async function answerProblem(oracle: ContentOracle, problem: Problem): Promise<ProblemResult> {
  console.error(`[Answers] Solving problem ${problem.id} (${problem.subquestions.length} subquestions)`);
  const response = await oracle.complete(ANSWER_SYSTEM_PROMPT, buildAnswerTurns(problem));

  const payload: AnswerPayload = response.error
    ? { kind: 'Unparseable', reason: response.error, raw: response.content }
    : decodeAnswerPayload(response.content);

  if (payload.kind === 'Unparseable') {
    console.error(`[Answers] Problem ${problem.id}: unusable reply (${payload.reason}), using raw text for every subquestion`);
  } else {
    console.error(`[Answers] Problem ${problem.id}: oracle returned ${payload.answers.length} answers`);
  }

  return alignAnswers(problem, payload);
}

/**
 * Answer every problem with at most `concurrency` oracle calls in flight.
 * Results keep problem order.
 */
export async function answerProblems(
  oracle: ContentOracle,
  problems: readonly Problem[],
  concurrency: number = 1
): Promise<ProblemResult[]> {
  const results: ProblemResult[] = new Array(problems.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < problems.length) {
      const index = next++;
      results[index] = await answerProblem(oracle, problems[index]);
    }
  };

  const workers = Math.max(1, Math.min(concurrency, problems.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
