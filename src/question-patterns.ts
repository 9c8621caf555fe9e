/**
 * Oracle-free question recognition: scans text elements line by line for
 * numbering patterns. Image elements are ignored.
 */

import { Element, QuestionFragment } from './types/index.js';

// Checked in order, first hit wins
export const QUESTION_PATTERNS: readonly RegExp[] = [
  /^(\d+)\s*[.、。)]/,        // "3." "3、" "3)"
  /^第\s*(\d+)\s*题/,          // "第 3 题"
  /^题\s*(\d+)/,               // "题3"
  /^([0-9]+[a-zA-Z]?)\s*[.、)]/, // "2b." "2b)"
];

export function matchQuestionId(line: string): string | null {
  for (const pattern of QUESTION_PATTERNS) {
    const match = pattern.exec(line);
    if (match) return match[1];
  }
  return null;
}

export function recognizeQuestionsByPattern(elements: readonly Element[]): QuestionFragment[] {
  const fragments: QuestionFragment[] = [];

  for (const element of elements) {
    if (element.kind !== 'text') continue;

    for (const rawLine of element.content.split('\n')) {
      const line = rawLine.trim();
      if (!line) continue;

      const id = matchQuestionId(line);
      if (id === null) continue;

      fragments.push({
        id,
        text: line,
        relatedElementIndices: [],
        pages: [element.pageNumber],
      });
    }
  }

  console.error(`[Patterns] Recognized ${fragments.length} question fragments`);
  return fragments;
}
