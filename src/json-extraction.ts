/**
 * JSON extraction from free-form oracle replies.
 *
 * Selection order: a ```json fenced block, else the span from the first `{`
 * to the last `}`. The span rule is kept literal: two objects separated by
 * prose select one unparseable substring.
 */

const JSON_FENCE = '```json';
const FENCE = '```';

export type JsonExtraction =
  | { ok: true; value: unknown; source: string }
  | { ok: false; reason: 'StructureParseFailure'; source: string; message: string };

export function selectJsonCandidate(raw: string): string {
  const fenceStart = raw.indexOf(JSON_FENCE);
  if (fenceStart !== -1) {
    const bodyStart = fenceStart + JSON_FENCE.length;
    const fenceEnd = raw.indexOf(FENCE, bodyStart);
    // Truncated replies may never close the fence
    return (fenceEnd === -1 ? raw.slice(bodyStart) : raw.slice(bodyStart, fenceEnd)).trim();
  }

  const open = raw.indexOf('{');
  const close = raw.lastIndexOf('}');
  if (open === -1 || close < open) return '';
  return raw.slice(open, close + 1).trim();
}

export function extractJson(raw: string): JsonExtraction {
  const source = selectJsonCandidate(raw);
  if (!source) {
    return { ok: false, reason: 'StructureParseFailure', source, message: 'No JSON object found' };
  }

  try {
    return { ok: true, value: JSON.parse(source), source };
  } catch (error) {
    return {
      ok: false,
      reason: 'StructureParseFailure',
      source,
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
