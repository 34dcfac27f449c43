import type { MatchingRules, RuleSet } from '../../shared/types';

export type PathSegment = string | number;

type PatternSegment = { kind: 'key'; name: string } | { kind: 'index'; index: number } | { kind: 'any' };

interface CompiledRule {
  pattern: PatternSegment[];
  specificity: number;
  ruleSet: RuleSet;
}

const SIMPLE_KEY = /^[A-Za-z0-9_-]+$/;

/** `['body', 'items', 0, 'id']` → `$.body.items[0].id` */
export function formatPath(segments: readonly PathSegment[]): string {
  let out = '$';
  for (const segment of segments) {
    if (typeof segment === 'number') out += `[${segment}]`;
    else if (SIMPLE_KEY.test(segment)) out += `.${segment}`;
    else out += `['${segment}']`;
  }
  return out;
}

/**
 * Parse a rule path such as `$.body.items[*].id` or `$.body['a.b']`.
 * Returns null for paths this matcher cannot address.
 */
export function parseRulePath(path: string): PatternSegment[] | null {
  if (!path.startsWith('$')) return null;

  const token = /^(?:\.\*|\[\*\]|\[(\d+)\]|\['([^']*)'\]|\.([^.[]+))/;
  const segments: PatternSegment[] = [];
  let rest = path.slice(1);

  while (rest.length > 0) {
    const m = token.exec(rest);
    if (!m) return null;
    if (m[1] !== undefined) segments.push({ kind: 'index', index: Number(m[1]) });
    else if (m[2] !== undefined) segments.push({ kind: 'key', name: m[2] });
    else if (m[3] !== undefined) segments.push(m[3] === '*' ? { kind: 'any' } : { kind: 'key', name: m[3] });
    else segments.push({ kind: 'any' });
    rest = rest.slice(m[0].length);
  }
  return segments;
}

export class RuleIndex {
  private readonly bodyRules: CompiledRule[] = [];
  private readonly headerRules = new Map<string, RuleSet>();

  constructor(rules: MatchingRules) {
    for (const [path, ruleSet] of Object.entries(rules)) {
      if (path.startsWith('$.headers.')) {
        this.headerRules.set(path.slice('$.headers.'.length).toLowerCase(), ruleSet);
        continue;
      }
      const pattern = parseRulePath(path);
      if (!pattern || pattern.length === 0) continue;
      const first = pattern[0];
      if (first.kind !== 'key' || first.name !== 'body') continue;
      this.bodyRules.push({
        pattern,
        specificity: pattern.filter((s) => s.kind !== 'any').length,
        ruleSet,
      });
    }
  }

  /** Most specific body rule addressing exactly this path. */
  forPath(path: readonly PathSegment[]): RuleSet | null {
    let best: CompiledRule | null = null;
    for (const rule of this.bodyRules) {
      if (!patternMatches(rule.pattern, path)) continue;
      if (!best || rule.specificity > best.specificity) best = rule;
    }
    return best?.ruleSet ?? null;
  }

  forHeader(name: string): RuleSet | null {
    return this.headerRules.get(name.toLowerCase()) ?? null;
  }
}

function patternMatches(pattern: readonly PatternSegment[], path: readonly PathSegment[]): boolean {
  if (pattern.length !== path.length) return false;
  return pattern.every((segment, i) => {
    const actual = path[i];
    switch (segment.kind) {
      case 'any':
        return true;
      case 'key':
        return actual === segment.name;
      case 'index':
        return actual === segment.index;
    }
  });
}
