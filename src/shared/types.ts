// === Pact Document ===

export interface ExpectedRequest {
  method: string;
  path: string;
  query: Record<string, string[]>;
  headers: Record<string, string>;
  body?: unknown;
}

export type MatcherKind =
  | 'type'
  | 'regex'
  | 'integer'
  | 'decimal'
  | 'number'
  | 'boolean'
  | 'include'
  | 'equality'
  | 'null';

export interface MatchingRule {
  match: MatcherKind;
  /** Matcher named in the pact when pactcheck has no evaluator for it; `match` is then `type`. */
  declaredMatch?: string;
  regex?: string;
  min?: number;
  max?: number;
  value?: string;
}

export interface RuleSet {
  combine: 'AND' | 'OR';
  matchers: MatchingRule[];
}

/** Keyed by full path: `$.body.items[*].id`, `$.headers.Content-Type`. */
export type MatchingRules = Record<string, RuleSet>;

export interface ExpectedResponse {
  status: number;
  headers: Record<string, string>;
  /** `undefined` means the body is not checked. */
  body?: unknown;
  matchingRules: MatchingRules;
}

export interface Interaction {
  description: string;
  providerState: string | null;
  request: ExpectedRequest;
  response: ExpectedResponse;
}

export interface PactDocument {
  consumer: string;
  provider: string;
  interactions: Interaction[];
  specificationVersion: string | null;
}

export interface PactCredentials {
  username: string;
  password: string;
}

// === Provider Calls ===

export type HttpClient = (url: string, init: RequestInit) => Promise<Response>;

export interface ActualResponse {
  status: number;
  /** Header names lower-cased. */
  headers: Record<string, string>;
  rawBody: string;
  body: unknown;
}

export type Action = () => void | Promise<void>;

export interface StateAction {
  setup?: Action;
  teardown?: Action;
}

// === Verdicts ===

export type MismatchKind = 'status' | 'header' | 'body';

export interface Mismatch {
  kind: MismatchKind;
  path: string;
  expected: unknown;
  actual: unknown;
  message: string;
}

export interface MatchResult {
  matched: boolean;
  mismatches: Mismatch[];
}

export interface InteractionVerdict {
  description: string;
  providerState: string | null;
  matched: boolean;
  mismatches: Mismatch[];
  errors: PactCheckError[];
  passed: boolean;
  durationMs: number;
}

export interface VerificationReport {
  consumer: string;
  provider: string;
  success: boolean;
  verdicts: InteractionVerdict[];
  durationMs: number;
}

// === Error Type ===

export type ErrorCategory = 'configuration' | 'source' | 'selection' | 'interaction' | 'run';

export type ErrorCode =
  | 'EMPTY_CONSUMER'
  | 'EMPTY_PROVIDER'
  | 'PROVIDER_NOT_CONFIGURED'
  | 'INVALID_CONFIG'
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_DOCUMENT'
  | 'INVALID_DOCUMENT'
  | 'NO_MATCHING_INTERACTIONS'
  | 'SETUP_FAILED'
  | 'TEARDOWN_FAILED'
  | 'TRANSPORT_ERROR'
  | 'MISMATCH_FOUND'
  | 'VERIFICATION_FAILED';

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  EMPTY_CONSUMER: 'configuration',
  EMPTY_PROVIDER: 'configuration',
  PROVIDER_NOT_CONFIGURED: 'configuration',
  INVALID_CONFIG: 'configuration',
  SOURCE_UNAVAILABLE: 'source',
  MALFORMED_DOCUMENT: 'source',
  INVALID_DOCUMENT: 'source',
  NO_MATCHING_INTERACTIONS: 'selection',
  SETUP_FAILED: 'interaction',
  TEARDOWN_FAILED: 'interaction',
  TRANSPORT_ERROR: 'interaction',
  MISMATCH_FOUND: 'interaction',
  VERIFICATION_FAILED: 'run',
};

export interface ErrorContext {
  uri?: string;
  interaction?: string;
  providerState?: string;
  status?: number;
}

export class PactCheckError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly context: ErrorContext;
  readonly timestamp: string;

  constructor(opts: {
    code: ErrorCode;
    message: string;
    context?: ErrorContext;
    cause?: unknown;
  }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'PactCheckError';
    this.code = opts.code;
    this.category = CATEGORY_BY_CODE[opts.code];
    this.context = opts.context ?? {};
    this.timestamp = new Date().toISOString();
  }
}

export function isPactCheckError(err: unknown, code?: ErrorCode): err is PactCheckError {
  return err instanceof PactCheckError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// === Configuration ===

/** Contents of `.pactcheck.yml` after defaults are applied. */
export interface PactCheckConfig {
  provider: {
    name: string;
    base_url: string;
    timeout_ms?: number;
  };
  consumer: {
    name: string;
  };
  pact: {
    uri: string;
    username?: string;
    password?: string;
  };
  filter: {
    description: string;
    state: string;
  };
}

/** Settings read from the process environment. */
export interface EnvConfig {
  log_level: string;
  broker_username?: string;
  broker_password?: string;
  timeout_ms: number;
}
