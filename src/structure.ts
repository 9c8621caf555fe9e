/**
 * Structure inference - asks the oracle to segment ordered elements into
 * problems and subquestions, degrading to pattern recognition + prefix
 * grouping when the reply is unusable.
 */

import { z } from 'zod';
import {
  ContentOracle,
  ContentTurn,
  Element,
  PageToken,
  ProblemOutline,
  QuestionFragment,
} from './types/index.js';
import { isImageElement } from './elements.js';
import { extractJson, isJsonObject } from './json-extraction.js';
import { recognizeQuestionsByPattern } from './question-patterns.js';
import { groupFragmentsByPrefix } from './grouping.js';

export const STRUCTURE_SYSTEM_PROMPT = [
  'You are an expert at analysing the structure of homework and exam papers.',
  'Identify every whole problem. For each one keep its stem (text), its subquestions,',
  'and for every item the pages it appears on and relatedElementIndices:',
  'zero-based positions of the input segments that belong to it.',
  'Return strictly JSON in this shape:',
  '{"problems":[{"id":"1","text":"stem (may be empty)","relatedElementIndices":[0,1],"pages":[1],' +
    '"subquestions":[{"id":"1(a)","text":"subquestion text","relatedElementIndices":[2],"pages":[1]}]}]}',
  'Return only the JSON, with no explanation.',
].join('\n');

// ============================================================================
// Payload decoding
// ============================================================================

function toPageToken(value: unknown): PageToken {
  return typeof value === 'number' || typeof value === 'string' ? value : JSON.stringify(value);
}

// A scalar becomes a one-item list; odd entries stay as inert verbatim tokens
const pageListSchema = z.unknown().transform((value): PageToken[] | undefined => {
  if (value === undefined || value === null) return undefined;
  return (Array.isArray(value) ? value : [value]).map(toPageToken);
});

const indexListSchema = z
  .array(z.unknown())
  .catch([])
  .transform((values) => values.filter((v): v is number => typeof v === 'number' && Number.isInteger(v)));

const outlineFieldsSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
  text: z.string().catch(''),
  relatedElementIndices: indexListSchema.optional(),
  related_elements: indexListSchema.optional(),
  pages: pageListSchema,
});

type OutlineFields = z.infer<typeof outlineFieldsSchema>;

const problemSchema = outlineFieldsSchema.extend({
  subquestions: z.array(z.unknown()).catch([]),
});

export type StructurePayload =
  | { kind: 'NativeHierarchy'; problems: ProblemOutline[] }
  | { kind: 'LegacyFlatList'; questions: QuestionFragment[] }
  | { kind: 'Unparseable'; reason: string; source: string };

function toFragment(fields: OutlineFields): QuestionFragment {
  return {
    id: fields.id ?? '',
    text: fields.text,
    relatedElementIndices: fields.relatedElementIndices ?? fields.related_elements ?? [],
    pages: fields.pages,
  };
}

function decodeFragments(entries: readonly unknown[]): QuestionFragment[] {
  const fragments: QuestionFragment[] = [];
  for (const entry of entries) {
    const parsed = outlineFieldsSchema.safeParse(entry);
    if (parsed.success) fragments.push(toFragment(parsed.data));
  }
  return fragments;
}

function decodeProblems(entries: readonly unknown[]): ProblemOutline[] {
  const problems: ProblemOutline[] = [];
  for (const entry of entries) {
    const parsed = problemSchema.safeParse(entry);
    if (!parsed.success) continue;
    const { subquestions, ...fields } = parsed.data;
    problems.push({
      id: fields.id,
      text: fields.text,
      relatedElementIndices: fields.relatedElementIndices ?? fields.related_elements ?? [],
      pages: fields.pages ?? [],
      subquestions: decodeFragments(subquestions),
    });
  }
  return problems;
}

/**
 * Classify an oracle reply. A JSON object that carries neither a non-empty
 * `problems` nor a `questions` array decodes as an empty native hierarchy.
 */
export function decodeStructurePayload(raw: string): StructurePayload {
  if (!raw.trim()) {
    return { kind: 'Unparseable', reason: 'Empty response', source: '' };
  }

  const extraction = extractJson(raw);
  if (!extraction.ok) {
    return { kind: 'Unparseable', reason: extraction.message, source: extraction.source };
  }
  if (!isJsonObject(extraction.value)) {
    return { kind: 'Unparseable', reason: 'Top-level JSON is not an object', source: extraction.source };
  }

  const { problems, questions } = extraction.value;
  const decodedProblems = Array.isArray(problems) ? decodeProblems(problems) : [];
  if (decodedProblems.length === 0 && Array.isArray(questions)) {
    return { kind: 'LegacyFlatList', questions: decodeFragments(questions) };
  }
  return { kind: 'NativeHierarchy', problems: decodedProblems };
}

// ============================================================================
// Inference
// ============================================================================

export function buildElementTurns(elements: readonly Element[]): ContentTurn[] {
  return elements.map((element): ContentTurn =>
    isImageElement(element)
      ? { type: 'image', data: element.content, mimeType: 'image/jpeg' }
      : { type: 'text', text: element.content }
  );
}

export function recognizeByFallback(elements: readonly Element[]): ProblemOutline[] {
  return groupFragmentsByPrefix(recognizeQuestionsByPattern(elements));
}

/**
 * Infer the problem hierarchy for already-ordered elements.
 * Always resolves; an empty list means nothing was recognized.
 */
export async function inferStructure(
  oracle: ContentOracle,
  elements: readonly Element[]
): Promise<ProblemOutline[]> {
  console.error(`[Structure] Requesting hierarchy for ${elements.length} elements...`);
  const response = await oracle.complete(STRUCTURE_SYSTEM_PROMPT, buildElementTurns(elements));

  const payload: StructurePayload = response.error
    ? { kind: 'Unparseable', reason: response.error, source: '' }
    : decodeStructurePayload(response.content);

  switch (payload.kind) {
    case 'NativeHierarchy':
      console.error(`[Structure] Oracle returned ${payload.problems.length} problems`);
      return payload.problems;
    case 'LegacyFlatList':
      console.error(`[Structure] Oracle returned flat list of ${payload.questions.length} questions, grouping by prefix`);
      return groupFragmentsByPrefix(payload.questions);
    case 'Unparseable':
      console.error(`[Structure] Unusable reply (${payload.reason}), falling back to pattern recognition`);
      return recognizeByFallback(elements);
  }
}
