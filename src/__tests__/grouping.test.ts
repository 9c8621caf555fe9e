/**
 * Prefix grouping of flat question fragments
 */

import { describe, it, expect } from 'vitest';
import { extractProblemPrefix, groupFragmentsByPrefix } from '../grouping.js';
import { QuestionFragment } from '../types/index.js';

function fragment(id: string, pages: number[] = [1]): QuestionFragment {
  return { id, text: `q${id}`, relatedElementIndices: [], pages };
}

describe('extractProblemPrefix', () => {
  it('takes the leading digit run', () => {
    expect(extractProblemPrefix('12b')).toBe('12');
    expect(extractProblemPrefix('3')).toBe('3');
  });

  it('keeps ids without leading digits whole', () => {
    expect(extractProblemPrefix('a1')).toBe('a1');
    expect(extractProblemPrefix('')).toBe('');
  });
});

describe('groupFragmentsByPrefix', () => {
  it('starts a new problem whenever the prefix changes', () => {
    const problems = groupFragmentsByPrefix(['1', '1a', '2', '2b', '1c'].map((id) => fragment(id)));

    expect(problems.map((p) => p.id)).toEqual(['1', '2', '1']);
    expect(problems.map((p) => p.subquestions.map((s) => s.id))).toEqual([['1', '1a'], ['2', '2b'], ['1c']]);
  });

  it('leaves problem-level text, indices and pages empty', () => {
    const [problem] = groupFragmentsByPrefix([fragment('4', [2])]);
    expect(problem).toEqual({
      id: '4',
      text: '',
      relatedElementIndices: [],
      pages: [],
      subquestions: [{ id: '4', text: 'q4', relatedElementIndices: [], pages: [2] }],
    });
  });

  it('preserves every fragment exactly once', () => {
    const input = ['1', '2', '2a', '3', '3a', '3b'].map((id) => fragment(id));
    const problems = groupFragmentsByPrefix(input);
    expect(problems.flatMap((p) => p.subquestions.map((s) => s.id))).toEqual(input.map((f) => f.id));
  });

  it('returns no problems for no fragments', () => {
    expect(groupFragmentsByPrefix([])).toEqual([]);
  });
});
