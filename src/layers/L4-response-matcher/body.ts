import { isDeepStrictEqual } from 'util';
import type { MatcherKind, MatchingRule, Mismatch, MismatchKind, RuleSet } from '../../shared/types';
import { formatPath, type PathSegment, type RuleIndex } from './paths';

const MATCHER_KINDS: readonly MatcherKind[] = [
  'type',
  'regex',
  'integer',
  'decimal',
  'number',
  'boolean',
  'include',
  'equality',
  'null',
];

export interface CompareContext {
  rules: RuleIndex;
  mismatches: Mismatch[];
  kind: MismatchKind;
}

interface InlineMatcher {
  ruleSet: RuleSet;
  example: unknown;
  nullable: boolean;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatValue(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

function describeKind(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'an array';
  if (typeof value === 'object') return 'an object';
  return `a ${typeof value}`;
}

function sameKind(a: unknown, b: unknown): boolean {
  return describeKind(a) === describeKind(b);
}

function plural(n: number): string {
  return n === 1 ? 'element' : 'elements';
}

function report(
  ctx: CompareContext,
  path: readonly PathSegment[],
  expected: unknown,
  actual: unknown,
  message: string,
): void {
  ctx.mismatches.push({ kind: ctx.kind, path: formatPath(path), expected, actual, message });
}

/**
 * Recognise a consumer-side placeholder such as
 * `{ "pact:matcher:type": "regex", "value": "abc", "regex": "^a" }`.
 */
export function asInlineMatcher(value: unknown): InlineMatcher | null {
  if (!isPlainObject(value)) return null;
  const kind = value['pact:matcher:type'];
  if (typeof kind !== 'string') return null;

  const match = MATCHER_KINDS.find((k) => k === kind) ?? (typeof value.regex === 'string' ? 'regex' : 'type');
  const rule: MatchingRule = { match };
  if (typeof value.regex === 'string') rule.regex = value.regex;
  if (typeof value.min === 'number') rule.min = value.min;
  if (typeof value.max === 'number') rule.max = value.max;
  if (match === 'include' && typeof value.value === 'string') rule.value = value.value;

  return {
    ruleSet: { combine: 'AND', matchers: [rule] },
    example: value.value,
    nullable: value['pact:matcher:nullable'] === true,
  };
}

/** Compare one node: inline placeholder, then path rule, then literal structure. */
export function compareValue(
  expected: unknown,
  actual: unknown,
  path: PathSegment[],
  ctx: CompareContext,
  typeOnly = false,
): void {
  const inline = asInlineMatcher(expected);
  if (inline) {
    if (inline.nullable && actual === null) return;
    applyRuleSet(inline.ruleSet, inline.example, actual, path, ctx);
    return;
  }

  const ruleSet = ctx.kind === 'body' ? ctx.rules.forPath(path) : null;
  if (ruleSet) {
    applyRuleSet(ruleSet, expected, actual, path, ctx);
    return;
  }

  compareStructure(expected, actual, path, ctx, typeOnly);
}

/**
 * Expected keys and positions must be present in actual; extra actual keys
 * and trailing elements are allowed. With `typeOnly`, leaves compare by kind.
 */
export function compareStructure(
  expected: unknown,
  actual: unknown,
  path: PathSegment[],
  ctx: CompareContext,
  typeOnly: boolean,
): void {
  if (Array.isArray(expected)) {
    if (!Array.isArray(actual)) {
      report(ctx, path, expected, actual, `Expected an array but was ${describeKind(actual)}`);
      return;
    }
    if (actual.length < expected.length) {
      report(
        ctx,
        path,
        expected,
        actual,
        `Expected an array with at least ${expected.length} ${plural(expected.length)} but got ${actual.length}`,
      );
    }
    const shared = Math.min(expected.length, actual.length);
    for (let i = 0; i < shared; i++) {
      compareValue(expected[i], actual[i], [...path, i], ctx, typeOnly);
    }
    return;
  }

  if (isPlainObject(expected)) {
    if (!isPlainObject(actual)) {
      report(ctx, path, expected, actual, `Expected an object but was ${describeKind(actual)}`);
      return;
    }
    for (const [key, value] of Object.entries(expected)) {
      if (!Object.prototype.hasOwnProperty.call(actual, key)) {
        report(ctx, [...path, key], value, undefined, `Expected key '${key}' but it was missing`);
        continue;
      }
      compareValue(value, actual[key], [...path, key], ctx, typeOnly);
    }
    return;
  }

  if (typeOnly) {
    if (!sameKind(expected, actual)) {
      report(ctx, path, expected, actual, `Expected ${describeKind(expected)} but was ${describeKind(actual)}`);
    }
    return;
  }

  if (expected !== actual) {
    report(ctx, path, expected, actual, `Expected ${formatValue(expected)} but was ${formatValue(actual)}`);
  }
}

/** AND: every matcher must pass. OR: the first passing matcher wins. */
export function applyRuleSet(
  ruleSet: RuleSet,
  expected: unknown,
  actual: unknown,
  path: PathSegment[],
  ctx: CompareContext,
): void {
  if (ruleSet.combine === 'AND') {
    for (const rule of ruleSet.matchers) applyRule(rule, expected, actual, path, ctx);
    return;
  }

  let firstFailure: Mismatch[] | null = null;
  for (const rule of ruleSet.matchers) {
    const scratch: CompareContext = { ...ctx, mismatches: [] };
    applyRule(rule, expected, actual, path, scratch);
    if (scratch.mismatches.length === 0) return;
    firstFailure ??= scratch.mismatches;
  }
  ctx.mismatches.push(...(firstFailure ?? []));
}

function applyRule(
  rule: MatchingRule,
  expected: unknown,
  actual: unknown,
  path: PathSegment[],
  ctx: CompareContext,
): void {
  switch (rule.match) {
    case 'type':
      applyTypeRule(rule, expected, actual, path, ctx);
      return;

    case 'regex': {
      if (rule.regex === undefined) {
        report(ctx, path, expected, actual, 'Regex matching rule has no pattern');
        return;
      }
      let pattern: RegExp;
      try {
        pattern = new RegExp(rule.regex);
      } catch {
        report(ctx, path, expected, actual, `Invalid regex /${rule.regex}/ in matching rule`);
        return;
      }
      const scalar = typeof actual === 'string' || typeof actual === 'number' || typeof actual === 'boolean';
      if (!scalar || !pattern.test(String(actual))) {
        report(ctx, path, expected, actual, `Expected ${formatValue(actual)} to match /${rule.regex}/`);
      }
      return;
    }

    case 'integer':
      if (!Number.isInteger(actual)) {
        report(ctx, path, expected, actual, `Expected an integer but was ${formatValue(actual)}`);
      }
      return;

    case 'decimal':
    case 'number':
      if (typeof actual !== 'number' || !Number.isFinite(actual)) {
        report(ctx, path, expected, actual, `Expected a number but was ${formatValue(actual)}`);
      }
      return;

    case 'boolean':
      if (typeof actual !== 'boolean') {
        report(ctx, path, expected, actual, `Expected a boolean but was ${formatValue(actual)}`);
      }
      return;

    case 'null':
      if (actual !== null) {
        report(ctx, path, expected, actual, `Expected null but was ${formatValue(actual)}`);
      }
      return;

    case 'include': {
      const needle = rule.value ?? String(expected);
      if (typeof actual !== 'string' || !actual.includes(needle)) {
        report(ctx, path, expected, actual, `Expected ${formatValue(actual)} to include ${formatValue(needle)}`);
      }
      return;
    }

    case 'equality':
      if (!isDeepStrictEqual(expected, actual)) {
        report(ctx, path, expected, actual, `Expected ${formatValue(expected)} but was ${formatValue(actual)}`);
      }
      return;
  }
}

function applyTypeRule(
  rule: MatchingRule,
  expected: unknown,
  actual: unknown,
  path: PathSegment[],
  ctx: CompareContext,
): void {
  const bounded = rule.min !== undefined || rule.max !== undefined;
  if (!Array.isArray(expected) || !bounded) {
    compareStructure(expected, actual, path, ctx, true);
    return;
  }

  if (!Array.isArray(actual)) {
    report(ctx, path, expected, actual, `Expected an array but was ${describeKind(actual)}`);
    return;
  }
  if (rule.min !== undefined && actual.length < rule.min) {
    report(ctx, path, expected, actual, `Expected at least ${rule.min} ${plural(rule.min)} but got ${actual.length}`);
  }
  if (rule.max !== undefined && actual.length > rule.max) {
    report(ctx, path, expected, actual, `Expected at most ${rule.max} ${plural(rule.max)} but got ${actual.length}`);
  }
  if (expected.length === 0) return;

  // every actual element is checked against the first expected element
  const template: unknown = expected[0];
  actual.forEach((element: unknown, i) => {
    compareValue(template, element, [...path, i], ctx, true);
  });
}
