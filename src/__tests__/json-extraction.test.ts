/**
 * JSON extraction from free-form oracle replies
 */

import { describe, it, expect } from 'vitest';
import { extractJson, isJsonObject, selectJsonCandidate } from '../json-extraction.js';

// ============================================================================
// selectJsonCandidate
// ============================================================================

describe('selectJsonCandidate', () => {
  it('prefers a json fenced block', () => {
    const raw = 'Sure!\n```json\n{"problems": []}\n```\nand {"other": 1}';
    expect(selectJsonCandidate(raw)).toBe('{"problems": []}');
  });

  it('takes the rest of the reply when the fence never closes', () => {
    expect(selectJsonCandidate('```json\n{"a": 1}\n')).toBe('{"a": 1}');
  });

  it('falls back to the first-brace to last-brace span', () => {
    expect(selectJsonCandidate('Answer: {"a": {"b": 2}} done')).toBe('{"a": {"b": 2}}');
  });

  it('returns an empty string when no braces exist', () => {
    expect(selectJsonCandidate('no json here')).toBe('');
  });

  it('returns an empty string when the last } precedes the first {', () => {
    expect(selectJsonCandidate('} then {')).toBe('');
  });
});

// ============================================================================
// extractJson
// ============================================================================

describe('extractJson', () => {
  it('parses the fenced body', () => {
    const result = extractJson('```json\n{"problems": [{"id": "1"}]}\n```');
    expect(result).toEqual({
      ok: true,
      value: { problems: [{ id: '1' }] },
      source: '{"problems": [{"id": "1"}]}',
    });
  });

  it('fails when two objects are separated by prose', () => {
    const result = extractJson('{"a": 1} and also {"b": 2}');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('StructureParseFailure');
      expect(result.source).toBe('{"a": 1} and also {"b": 2}');
    }
  });

  it('reports a missing object', () => {
    expect(extractJson('plain text')).toEqual({
      ok: false,
      reason: 'StructureParseFailure',
      source: '',
      message: 'No JSON object found',
    });
  });

  it('reports an empty reply the same way', () => {
    const result = extractJson('');
    expect(result.ok).toBe(false);
  });
});

describe('isJsonObject', () => {
  it('accepts plain objects only', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('x')).toBe(false);
  });
});
