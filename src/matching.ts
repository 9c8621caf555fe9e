import {
  Element,
  PageToken,
  Problem,
  ProblemOutline,
  Subquestion,
  SubquestionOutline,
} from './types/index.js';
import { isImageElement } from './elements.js';

// Lossy default when neither images nor matching text are found in the window
export const INFERENCE_FALLBACK_LIMIT = 3;

/**
 * Map oracle-declared indices onto elements. Out-of-range indices are dropped.
 */
export function resolveElementIndices(indices: readonly number[], elements: readonly Element[]): Element[] {
  const resolved: Element[] = [];
  for (const index of indices) {
    if (Number.isInteger(index) && index >= 0 && index < elements.length) {
      resolved.push(elements[index]);
    }
  }
  return resolved;
}

function toPageNumber(token: PageToken): number | null {
  if (typeof token === 'number') return Number.isFinite(token) ? Math.trunc(token) : null;
  return /^\s*[+-]?\d+\s*$/.test(token) ? parseInt(token, 10) : null;
}

/**
 * Pages p-1..p+1 for every declared page. Tokens that are not integers are
 * kept verbatim, which never matches an element's numeric page. Undeclared
 * pages count as page 1; an explicit empty list yields an empty window.
 */
export function buildPageWindow(pages: readonly PageToken[] | undefined): Set<PageToken> {
  const window = new Set<PageToken>();
  for (const token of pages ?? [1]) {
    const page = toPageNumber(token);
    if (page === null) {
      window.add(token);
      continue;
    }
    window.add(page - 1);
    window.add(page);
    window.add(page + 1);
  }
  return window;
}

/**
 * Heuristic element selection for a subquestion with no declared indices:
 * every image in the page window, plus text elements that literally contain
 * the subquestion text. Falls back to the first few window elements.
 */
export function inferRelatedElements(
  question: Pick<SubquestionOutline, 'text' | 'pages'>,
  elements: readonly Element[]
): Element[] {
  const window = buildPageWindow(question.pages);
  const candidates = elements.filter((element) => window.has(element.pageNumber));
  const needle = question.text;

  const related = candidates.filter((element) => {
    if (isImageElement(element)) return true;
    return element.kind === 'text' && needle.trim().length > 0 && element.content.includes(needle);
  });

  return related.length > 0 ? related : candidates.slice(0, INFERENCE_FALLBACK_LIMIT);
}

export function matchSubquestion(outline: SubquestionOutline, elements: readonly Element[]): Subquestion {
  let related = resolveElementIndices(outline.relatedElementIndices, elements);
  if (related.length === 0) {
    related = inferRelatedElements(outline, elements);
  }

  return Object.freeze({
    id: outline.id,
    text: outline.text,
    images: Object.freeze(related.filter(isImageElement).map((element) => element.content)),
    pageNumbers: Object.freeze([...(outline.pages ?? [])]),
    relatedElements: Object.freeze(related),
  });
}

function unionElements(groups: ReadonlyArray<readonly Element[]>): Element[] {
  const seen = new Set<Element>();
  const union: Element[] = [];
  for (const group of groups) {
    for (const element of group) {
      if (seen.has(element)) continue;
      seen.add(element);
      union.push(element);
    }
  }
  return union;
}

/**
 * Attach concrete elements to every problem and subquestion.
 * Problems left without subquestions are not emitted.
 */
export function matchProblemsWithElements(
  outlines: readonly ProblemOutline[],
  elements: readonly Element[]
): Problem[] {
  console.error(`[Matching] Matching ${outlines.length} problems against ${elements.length} elements...`);
  const problems: Problem[] = [];

  outlines.forEach((outline, index) => {
    const id = outline.id ?? `p${index}`;
    const own = resolveElementIndices(outline.relatedElementIndices, elements);
    const subquestions = outline.subquestions.map((sub) => matchSubquestion(sub, elements));

    for (const sub of subquestions) {
      console.error(`[Matching]   ${id}/${sub.id}: ${sub.relatedElements.length} elements, ${sub.images.length} images`);
    }

    if (subquestions.length === 0) {
      console.error(`[Matching] Problem ${id} has no subquestions, skipping`);
      return;
    }

    problems.push(Object.freeze({
      id,
      text: outline.text,
      pageNumbers: Object.freeze([...outline.pages]),
      relatedElements: Object.freeze(unionElements([own, ...subquestions.map((s) => s.relatedElements)])),
      subquestions: Object.freeze(subquestions),
    }));
  });

  return problems;
}
