import { ProblemOutline, QuestionFragment } from './types/index.js';

/**
 * Leading digit run of a question id ("12b" -> "12"); ids without one are
 * their own prefix.
 */
export function extractProblemPrefix(id: string): string {
  const match = /^(\d+)/.exec(id);
  return match ? match[1] : id;
}

/**
 * Merge flat fragments into problems in one left-to-right pass.
 *
 * A new problem starts whenever the prefix differs from the previous
 * fragment's, so ["1", "1a", "2", "1c"] yields three problems with "1c"
 * standing alone.
 */
export function groupFragmentsByPrefix(fragments: readonly QuestionFragment[]): ProblemOutline[] {
  const problems: ProblemOutline[] = [];
  let current: ProblemOutline | null = null;

  for (const fragment of fragments) {
    const prefix = extractProblemPrefix(fragment.id);
    if (current === null || current.id !== prefix) {
      current = { id: prefix, text: '', relatedElementIndices: [], pages: [], subquestions: [] };
      problems.push(current);
    }
    current.subquestions.push({
      id: fragment.id,
      text: fragment.text,
      relatedElementIndices: [...fragment.relatedElementIndices],
      pages: fragment.pages && [...fragment.pages],
    });
  }

  console.error(`[Grouping] ${fragments.length} fragments -> ${problems.length} problems`);
  return problems;
}
