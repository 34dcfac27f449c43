import type { ActualResponse, ExpectedResponse, MatchResult, Mismatch } from '../../shared/types';
import { compareValue, isPlainObject, asInlineMatcher, type CompareContext } from './body';
import { matchHeaders } from './headers';
import { RuleIndex } from './paths';

export { normalizeHeaderValue, contentTypeMatches } from './headers';
export { formatPath, parseRulePath, RuleIndex } from './paths';
export { formatValue } from './body';

/**
 * Compare an actual provider response against the expected one.
 * Every mismatch is collected, not just the first.
 */
export function matchResponse(expected: ExpectedResponse, actual: ActualResponse): MatchResult {
  const rules = new RuleIndex(expected.matchingRules);
  const mismatches: Mismatch[] = [];

  if (expected.status !== actual.status) {
    mismatches.push({
      kind: 'status',
      path: '$.status',
      expected: expected.status,
      actual: actual.status,
      message: `Expected status ${expected.status} but was ${actual.status}`,
    });
  }

  mismatches.push(...matchHeaders(expected.headers, actual.headers, rules));

  if (expected.body !== undefined) {
    const ctx: CompareContext = { rules, mismatches, kind: 'body' };
    compareValue(expected.body, coerceActualBody(expected.body, actual.body), ['body'], ctx);
  }

  return { matched: mismatches.length === 0, mismatches };
}

/** A structured expectation against a text body: try the text as JSON. */
function coerceActualBody(expected: unknown, actual: unknown): unknown {
  const shape = asInlineMatcher(expected)?.example ?? expected;
  const structured = Array.isArray(shape) || isPlainObject(shape);
  if (!structured || typeof actual !== 'string' || actual === '') return actual;
  try {
    return JSON.parse(actual);
  } catch {
    return actual;
  }
}
