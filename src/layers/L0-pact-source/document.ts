import { z } from 'zod';
import {
  PactCheckError,
  errorMessage,
  type Interaction,
  type MatchingRule,
  type MatchingRules,
  type PactDocument,
  type RuleSet,
} from '../../shared/types';

const matcherKindEnum = z.enum([
  'type',
  'regex',
  'integer',
  'decimal',
  'number',
  'boolean',
  'include',
  'equality',
  'null',
]);

// Matcher names outside matcherKindEnum (date, timestamp, contentType, values...)
// are kept and compared as `type`.
const ruleSchema = z.object({
  match: z.string().optional(),
  regex: z.string().optional(),
  min: z.number().int().nonnegative().optional(),
  max: z.number().int().nonnegative().optional(),
  value: z.string().optional(),
});

const ruleSetSchema = z.object({
  combine: z.enum(['AND', 'OR']).optional(),
  matchers: z.array(ruleSchema).min(1),
});

// v2: { "$.body.id": { "match": "type" } }
const flatRulesSchema = z.record(z.string().startsWith('$'), ruleSchema);

// v3: { "body": { "$.id": { "matchers": [...] } }, "header": { "Content-Type": {...} } }
const nestedRulesSchema = z
  .object({
    body: z.record(ruleSetSchema).optional(),
    header: z.record(ruleSetSchema).optional(),
    headers: z.record(ruleSetSchema).optional(),
    // request-side categories are accepted and ignored
    path: z.unknown().optional(),
    query: z.unknown().optional(),
    status: z.unknown().optional(),
  })
  .strict();

function isFlatRules(raw: Record<string, unknown>): boolean {
  return Object.keys(raw).every((key) => key.startsWith('$'));
}

// The layout is picked from the keys so that issues point into the layout the pact uses.
const matchingRulesSchema = z.record(z.unknown()).transform((raw, ctx): MatchingRules => {
  if (isFlatRules(raw)) {
    const flat = flatRulesSchema.safeParse(raw);
    if (flat.success) return normalizeFlatRules(flat.data);
    forwardIssues(flat.error, ctx);
    return z.NEVER;
  }
  const nested = nestedRulesSchema.safeParse(raw);
  if (nested.success) return normalizeNestedRules(nested.data);
  forwardIssues(nested.error, ctx);
  return z.NEVER;
});

function forwardIssues(error: z.ZodError, ctx: z.RefinementCtx): void {
  for (const issue of error.issues) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
  }
}

const headersSchema = z.record(z.union([z.string(), z.array(z.string())]));

const requestSchema = z.object({
  method: z.string().min(1, 'request method is required'),
  path: z.string().startsWith('/', { message: 'request path must start with "/"' }),
  query: z.union([z.string(), z.record(z.union([z.string(), z.array(z.string())]))]).optional(),
  headers: headersSchema.optional(),
  body: z.unknown().optional(),
});

const responseSchema = z.object({
  status: z.number().int().min(100).max(599),
  headers: headersSchema.optional(),
  body: z.unknown().optional(),
  matchingRules: matchingRulesSchema.optional(),
});

const interactionSchema = z.object({
  description: z.string().min(1, 'interaction description is required'),
  providerState: z.string().optional(),
  provider_state: z.string().optional(),
  providerStates: z.array(z.object({ name: z.string() })).optional(),
  request: requestSchema,
  response: responseSchema,
});

const specVersionSchema = z.object({ version: z.string() });

export const pactDocumentSchema = z.object({
  consumer: z.object({ name: z.string().min(1, 'consumer name is required') }),
  provider: z.object({ name: z.string().min(1, 'provider name is required') }),
  interactions: z.array(interactionSchema),
  metadata: z
    .object({
      pactSpecification: specVersionSchema.optional(),
      'pact-specification': specVersionSchema.optional(),
    })
    .optional(),
});

type RawPactDocument = z.infer<typeof pactDocumentSchema>;
type RawInteraction = z.infer<typeof interactionSchema>;
type RawRule = z.infer<typeof ruleSchema>;

/**
 * Parse and validate a pact document.
 * JSON errors are MALFORMED_DOCUMENT; schema violations are INVALID_DOCUMENT
 * and name the first offending field.
 */
export function parsePactDocument(raw: string, uri?: string): PactDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new PactCheckError({
      code: 'MALFORMED_DOCUMENT',
      message: `Pact document is not valid JSON: ${errorMessage(err)}`,
      context: { uri },
      cause: err,
    });
  }
  return validatePactDocument(parsed, uri);
}

export function validatePactDocument(value: unknown, uri?: string): PactDocument {
  const result = pactDocumentSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new PactCheckError({
      code: 'INVALID_DOCUMENT',
      message: `Invalid pact document: ${where}: ${issue.message}`,
      context: { uri },
    });
  }
  return normalizeDocument(result.data);
}

function normalizeDocument(doc: RawPactDocument): PactDocument {
  const declared = doc.metadata?.pactSpecification ?? doc.metadata?.['pact-specification'];
  return {
    consumer: doc.consumer.name,
    provider: doc.provider.name,
    interactions: doc.interactions.map(normalizeInteraction),
    specificationVersion: declared?.version ?? null,
  };
}

function normalizeInteraction(raw: RawInteraction): Interaction {
  const state = raw.providerState ?? raw.provider_state ?? raw.providerStates?.[0]?.name ?? '';
  return {
    description: raw.description,
    providerState: state === '' ? null : state,
    request: {
      method: raw.request.method.toUpperCase(),
      path: raw.request.path,
      query: normalizeQuery(raw.request.query),
      headers: normalizeHeaders(raw.request.headers),
      body: raw.request.body,
    },
    response: {
      status: raw.response.status,
      headers: normalizeHeaders(raw.response.headers),
      body: raw.response.body,
      matchingRules: raw.response.matchingRules ?? {},
    },
  };
}

function normalizeQuery(
  query: string | Record<string, string | string[]> | undefined,
): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  if (query === undefined) return out;

  if (typeof query === 'string') {
    for (const [key, value] of new URLSearchParams(query)) {
      (out[key] ??= []).push(value);
    }
    return out;
  }

  for (const [key, value] of Object.entries(query)) {
    out[key] = Array.isArray(value) ? [...value] : [value];
  }
  return out;
}

function normalizeHeaders(headers: Record<string, string | string[]> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    out[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return out;
}

function toRule(raw: RawRule): MatchingRule {
  const declared = raw.match ?? (raw.regex !== undefined ? 'regex' : 'type');
  const known = matcherKindEnum.safeParse(declared);
  const rule: MatchingRule = known.success ? { match: known.data } : { match: 'type', declaredMatch: declared };
  if (raw.regex !== undefined) rule.regex = raw.regex;
  if (raw.min !== undefined) rule.min = raw.min;
  if (raw.max !== undefined) rule.max = raw.max;
  if (raw.value !== undefined) rule.value = raw.value;
  return rule;
}

function normalizeFlatRules(raw: z.infer<typeof flatRulesSchema>): MatchingRules {
  const rules: MatchingRules = {};
  for (const [path, rule] of Object.entries(raw)) {
    const key = path.startsWith('$.header.') ? `$.headers.${path.slice('$.header.'.length)}` : path;
    rules[key] = { combine: 'AND', matchers: [toRule(rule)] };
  }
  return rules;
}

function normalizeNestedRules(raw: z.infer<typeof nestedRulesSchema>): MatchingRules {
  const rules: MatchingRules = {};
  for (const [path, set] of Object.entries(raw.body ?? {})) {
    rules[path === '$' ? '$.body' : `$.body${path.slice(1)}`] = toRuleSet(set.matchers, set.combine);
  }
  for (const [name, set] of Object.entries({ ...raw.header, ...raw.headers })) {
    rules[`$.headers.${name}`] = toRuleSet(set.matchers, set.combine);
  }
  return rules;
}

function toRuleSet(matchers: RawRule[], combine: 'AND' | 'OR' | undefined): RuleSet {
  return { combine: combine ?? 'AND', matchers: matchers.map(toRule) };
}
