import type { Mismatch } from '../../shared/types';
import { applyRuleSet, type CompareContext } from './body';
import type { RuleIndex } from './paths';

/** Whitespace after commas is not significant. */
export function normalizeHeaderValue(value: string): string {
  return value.trim().replace(/,\s+/g, ',');
}

interface MediaType {
  type: string;
  params: Map<string, string>;
}

function parseMediaType(value: string): MediaType {
  const [type, ...rest] = value.split(';');
  const params = new Map<string, string>();
  for (const part of rest) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    const name = part.slice(0, eq).trim().toLowerCase();
    const paramValue = part.slice(eq + 1).trim().replace(/^"(.*)"$/, '$1');
    params.set(name, name === 'charset' ? paramValue.toLowerCase() : paramValue);
  }
  return { type: type.trim().toLowerCase(), params };
}

/** Same media type, and every expected parameter present with the same value. */
export function contentTypeMatches(expected: string, actual: string): boolean {
  const e = parseMediaType(expected);
  const a = parseMediaType(actual);
  if (e.type !== a.type) return false;
  for (const [name, value] of e.params) {
    if (a.params.get(name) !== value) return false;
  }
  return true;
}

/**
 * Every expected header must be present in actual. Names are compared
 * case-insensitively; headers only present in actual are ignored.
 */
export function matchHeaders(
  expected: Record<string, string>,
  actual: Record<string, string>,
  rules: RuleIndex,
): Mismatch[] {
  const lowered = new Map<string, string>();
  for (const [name, value] of Object.entries(actual)) {
    lowered.set(name.toLowerCase(), value);
  }

  const ctx: CompareContext = { rules, mismatches: [], kind: 'header' };

  for (const [name, expectedValue] of Object.entries(expected)) {
    const key = name.toLowerCase();
    const actualValue = lowered.get(key);

    if (actualValue === undefined) {
      ctx.mismatches.push({
        kind: 'header',
        path: `$.headers.${name}`,
        expected: expectedValue,
        actual: undefined,
        message: `Expected header '${name}' but it was missing`,
      });
      continue;
    }

    const ruleSet = rules.forHeader(name);
    if (ruleSet) {
      applyRuleSet(ruleSet, expectedValue, actualValue, ['headers', name], ctx);
      continue;
    }

    const equal =
      key === 'content-type'
        ? contentTypeMatches(expectedValue, actualValue)
        : normalizeHeaderValue(expectedValue) === normalizeHeaderValue(actualValue);

    if (!equal) {
      ctx.mismatches.push({
        kind: 'header',
        path: `$.headers.${name}`,
        expected: expectedValue,
        actual: actualValue,
        message: `Expected header '${name}' to equal '${expectedValue}' but was '${actualValue}'`,
      });
    }
  }

  return ctx.mismatches;
}
