/**
 * Answer aggregation tests
 *
 * The invariant under test: one record per subquestion, in subquestion
 * order, whatever shape the oracle reply takes.
 */

import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'timers/promises';
import {
  alignAnswers,
  ANSWER_SYSTEM_PROMPT,
  answerProblem,
  answerProblems,
  buildAnswerTurns,
  decodeAnswerPayload,
} from '../answering.js';
import { createElement } from '../elements.js';
import { Problem, Subquestion } from '../types/index.js';
import { FakeOracle, textOf } from './helpers/fake-oracle.js';

function sub(id: string, text: string = `text ${id}`, images: string[] = []): Subquestion {
  return { id, text, images, pageNumbers: [1], relatedElements: [] };
}

function problem(id: string, subs: Subquestion[], text: string = 'Stem'): Problem {
  return { id, text, pageNumbers: [1], relatedElements: [], subquestions: subs };
}

// ============================================================================
// decodeAnswerPayload
// ============================================================================

describe('decodeAnswerPayload', () => {
  it('stringifies fields and keeps positions of malformed entries', () => {
    const raw = JSON.stringify({
      problem_text: 'Full stem',
      answers: [{ sub_id: 1, answer: 42, reason: null }, 'junk', { answer: { x: 1 } }],
    });

    expect(decodeAnswerPayload(raw)).toEqual({
      kind: 'Answers',
      problemText: 'Full stem',
      answers: [
        { subId: '1', answer: '42', reason: '' },
        { answer: '', reason: '' },
        { subId: undefined, answer: '{"x":1}', reason: '' },
      ],
    });
  });

  it('ignores a non-string problem_text', () => {
    const payload = decodeAnswerPayload('{"problem_text": 3, "answers": []}');
    expect(payload).toEqual({ kind: 'Answers', problemText: undefined, answers: [] });
  });

  it('yields no answers for JSON that is not an object', () => {
    expect(decodeAnswerPayload('```json\n"just a string"\n```')).toEqual({ kind: 'Answers', answers: [] });
  });

  it('marks replies without JSON as unparseable', () => {
    expect(decodeAnswerPayload('x = 2')).toEqual({ kind: 'Unparseable', reason: 'No JSON object found', raw: 'x = 2' });
    expect(decodeAnswerPayload('')).toEqual({ kind: 'Unparseable', reason: 'Empty response', raw: '' });
  });
});

// ============================================================================
// alignAnswers
// ============================================================================

describe('alignAnswers', () => {
  const twoParts = problem('1', [sub('a'), sub('b')]);

  it('matches answers by sub_id regardless of order', () => {
    const result = alignAnswers(twoParts, {
      kind: 'Answers',
      answers: [
        { subId: 'b', answer: 'B', reason: 'rb' },
        { subId: 'a', answer: 'A', reason: 'ra' },
      ],
    });

    expect(result.answers.map((a) => [a.subquestionId, a.answerText, a.reasoningText])).toEqual([
      ['a', 'A', 'ra'],
      ['b', 'B', 'rb'],
    ]);
    expect(result.subquestionCount).toBe(2);
  });

  it('falls back to position when sub_id is missing or unknown', () => {
    const result = alignAnswers(twoParts, {
      kind: 'Answers',
      answers: [
        { subId: 'zz', answer: 'first', reason: '' },
        { answer: 'second', reason: '' },
      ],
    });
    expect(result.answers.map((a) => a.answerText)).toEqual(['first', 'second']);
  });

  it('backfills unanswered subquestions with empty records', () => {
    const result = alignAnswers(twoParts, { kind: 'Answers', answers: [{ subId: 'b', answer: 'B', reason: 'r' }] });
    expect(result.answers).toEqual([
      { problemId: '1', subquestionId: 'a', subquestionText: 'text a', subquestionImages: [], answerText: '', reasoningText: '' },
      { problemId: '1', subquestionId: 'b', subquestionText: 'text b', subquestionImages: [], answerText: 'B', reasoningText: 'r' },
    ]);
  });

  it('drops extra answers that match no subquestion', () => {
    const result = alignAnswers(problem('1', [sub('a')]), {
      kind: 'Answers',
      answers: [
        { subId: 'a', answer: 'A', reason: '' },
        { subId: 'extra', answer: 'X', reason: '' },
      ],
    });
    expect(result.answers).toHaveLength(1);
    expect(result.answers[0].answerText).toBe('A');
  });

  it('keeps the first of duplicate answers', () => {
    const result = alignAnswers(twoParts, {
      kind: 'Answers',
      answers: [
        { subId: 'a', answer: 'first', reason: '' },
        { subId: 'a', answer: 'second', reason: '' },
      ],
    });
    expect(result.answers.map((a) => a.answerText)).toEqual(['first', '']);
  });

  it('overrides the problem text only with a non-blank stem', () => {
    expect(alignAnswers(twoParts, { kind: 'Answers', problemText: 'Better stem', answers: [] }).problemText).toBe('Better stem');
    expect(alignAnswers(twoParts, { kind: 'Answers', problemText: '   ', answers: [] }).problemText).toBe('Stem');
  });

  it('uses the raw reply for every subquestion when unparseable', () => {
    const result = alignAnswers(twoParts, { kind: 'Unparseable', reason: 'No JSON object found', raw: 'x = 2' });
    expect(result.problemText).toBe('Stem');
    expect(result.answers.map((a) => [a.answerText, a.reasoningText])).toEqual([
      ['x = 2', ''],
      ['x = 2', ''],
    ]);
  });

  it('reports an empty subquestion id as null and carries images', () => {
    const result = alignAnswers(problem('2', [sub('', 'only part', ['aW1n'])]), { kind: 'Answers', answers: [] });
    expect(result.answers[0].subquestionId).toBeNull();
    expect(result.answers[0].subquestionImages).toEqual(['aW1n']);
  });
});

// ============================================================================
// buildAnswerTurns / answerProblem / answerProblems
// ============================================================================

describe('buildAnswerTurns', () => {
  it('sends the stem, each subquestion, then every related image', () => {
    const image = createElement('image', 'aW1n', [0, 0, 10, 10], 1);
    const text = createElement('text', 'ignored', [0, 0, 10, 10], 1);
    const turns = buildAnswerTurns({
      ...problem('3', [sub('3a', 'Find y')], 'Given y = 2x'),
      relatedElements: [text, image],
    });

    expect(turns).toEqual([
      { type: 'text', text: 'Stem (problem 3):\nGiven y = 2x' },
      { type: 'text', text: 'Subquestion 3a:\nFind y' },
      { type: 'image', data: 'aW1n', mimeType: 'image/jpeg' },
    ]);
  });

  it('omits a blank stem', () => {
    expect(buildAnswerTurns(problem('4', [sub('4')], ' '))).toEqual([{ type: 'text', text: 'Subquestion 4:\ntext 4' }]);
  });
});

describe('answerProblem', () => {
  it('decodes the reply and sends the answer prompt', async () => {
    const oracle = new FakeOracle('```json\n{"answers":[{"sub_id":"a","answer":"1","reason":"r"}]}\n```');
    const result = await answerProblem(oracle, problem('1', [sub('a'), sub('b')]));

    expect(oracle.calls[0].systemPrompt).toBe(ANSWER_SYSTEM_PROMPT);
    expect(result.answers.map((a) => a.answerText)).toEqual(['1', '']);
  });

  it('uses the failure text for every subquestion when the oracle gave up', async () => {
    const oracle = new FakeOracle({ model: 'fake', content: 'Oracle call failed after 3 attempts', error: 'HTTP 500' });
    const result = await answerProblem(oracle, problem('1', [sub('a'), sub('b')]));
    expect(result.answers.map((a) => a.answerText)).toEqual([
      'Oracle call failed after 3 attempts',
      'Oracle call failed after 3 attempts',
    ]);
  });
});

describe('answerProblems', () => {
  const problems = ['1', '2', '3'].map((id) => problem(id, [sub(`${id}a`)]));

  // Slower replies for earlier problems so completion order differs from input order
  const delayedOracle = () =>
    new FakeOracle(async (turns) => {
      const subquestion = textOf(turns.find((turn) => textOf(turn).startsWith('Subquestion')));
      const id = subquestion.slice('Subquestion '.length, subquestion.indexOf(':'));
      await sleep(id === '1a' ? 30 : id === '2a' ? 15 : 0);
      return JSON.stringify({ answers: [{ sub_id: id, answer: `answer ${id}`, reason: '' }] });
    });

  it('keeps problem order with several calls in flight', async () => {
    const results = await answerProblems(delayedOracle(), problems, 3);
    expect(results.map((r) => r.answers[0].answerText)).toEqual(['answer 1a', 'answer 2a', 'answer 3a']);
  });

  it('answers sequentially by default', async () => {
    const oracle = delayedOracle();
    const results = await answerProblems(oracle, problems);
    expect(results.map((r) => r.problemId)).toEqual(['1', '2', '3']);
    expect(oracle.calls).toHaveLength(3);
  });

  it('returns nothing for no problems', async () => {
    expect(await answerProblems(new FakeOracle(), [], 4)).toEqual([]);
  });
});
