import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { pactCheckConfigSchema, type PactCheckConfigInput } from './schema';
import type { PactCheckConfig } from '../shared/types';

export interface ConfigWarning {
  field: string;
  message: string;
}

export interface LoadConfigResult {
  config: PactCheckConfig;
  warnings: ConfigWarning[];
}

export const DEFAULT_CONFIG_PATH = '.pactcheck.yml';

/** Values used when the file is absent or a field is omitted. */
export const CONFIG_DEFAULTS: PactCheckConfig = {
  provider: { name: '', base_url: '' },
  consumer: { name: '' },
  pact: { uri: '' },
  filter: { description: '', state: '' },
};

/** Known keys per section, for stripping and "did you mean?" suggestions. */
const KNOWN_KEYS: Record<string, string[]> = {
  provider: ['name', 'base_url', 'timeout_ms'],
  consumer: ['name'],
  pact: ['uri', 'username', 'password'],
  filter: ['description', 'state'],
};

/**
 * Load and validate a .pactcheck.yml file.
 *
 * - Missing or empty file → defaults
 * - Invalid YAML → E501 warning + defaults
 * - Invalid values → E502 warning, field falls back to its default
 * - Unknown keys → E502 warning with "did you mean?"
 */
export function loadPactCheckConfig(filePath?: string): LoadConfigResult {
  const warnings: ConfigWarning[] = [];
  const resolvedPath = filePath ?? DEFAULT_CONFIG_PATH;

  let rawContent: string;
  try {
    rawContent = fs.readFileSync(resolvedPath, 'utf-8');
  } catch {
    // no file: zero-config run driven by flags
    return { config: mergeConfig({}), warnings };
  }

  if (rawContent.trim() === '') {
    return { config: mergeConfig({}), warnings };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(rawContent);
  } catch (err) {
    warnings.push({
      field: '_yaml',
      message: `E501: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
    });
    return { config: mergeConfig({}), warnings };
  }

  // comments only
  if (parsed === null || parsed === undefined) {
    return { config: mergeConfig({}), warnings };
  }

  if (!isRecord(parsed)) {
    warnings.push({ field: '_yaml', message: 'E501: Config must be a YAML mapping. Using defaults.' });
    return { config: mergeConfig({}), warnings };
  }

  const result = pactCheckConfigSchema.safeParse(parsed);
  if (result.success) {
    return { config: mergeConfig(result.data), warnings };
  }

  const invalidPaths: string[][] = [];
  for (const issue of result.error.issues) {
    const fieldPath = issue.path.join('.');
    if (issue.code === 'unrecognized_keys') {
      const section = issue.path.length === 0 ? null : String(issue.path[0]);
      for (const key of issue.keys) {
        const suggestion = findSimilarKey(key, section ? KNOWN_KEYS[section] ?? [] : Object.keys(KNOWN_KEYS));
        const qualified = section ? `${section}.${key}` : key;
        warnings.push({
          field: qualified,
          message: suggestion
            ? `E502: Unknown key "${qualified}". Did you mean "${section ? `${section}.` : ''}${suggestion}"?`
            : `E502: Unknown key "${qualified}".`,
        });
      }
    } else {
      invalidPaths.push(issue.path.map(String));
      warnings.push({
        field: fieldPath || '_unknown',
        message: `E502: ${issue.message}. Using default for this field.`,
      });
    }
  }

  const cleaned = stripUnknownKeys(parsed);
  for (const path of invalidPaths) removePath(cleaned, path);

  const retryResult = pactCheckConfigSchema.safeParse(cleaned);
  if (retryResult.success) {
    return { config: mergeConfig(retryResult.data), warnings };
  }
  return { config: mergeConfig({}), warnings };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findSimilarKey(key: string, candidates: string[]): string | null {
  const lower = key.toLowerCase();
  for (const known of candidates) {
    if (levenshtein(lower, known) <= 3) {
      return known;
    }
  }
  return null;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

function stripUnknownKeys(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [section, keys] of Object.entries(KNOWN_KEYS)) {
    const value = obj[section];
    if (!isRecord(value)) {
      if (section in obj) result[section] = value;
      continue;
    }
    const kept: Record<string, unknown> = {};
    for (const key of keys) {
      if (key in value) kept[key] = value[key];
    }
    result[section] = kept;
  }
  return result;
}

function removePath(obj: Record<string, unknown>, path: string[]): void {
  if (path.length === 0) return;
  const [head, ...rest] = path;
  if (rest.length === 0) {
    delete obj[head];
    return;
  }
  const child = obj[head];
  if (isRecord(child)) removePath(child, rest);
}

/** User values take precedence over CONFIG_DEFAULTS. */
function mergeConfig(input: PactCheckConfigInput): PactCheckConfig {
  const { provider = {}, consumer = {}, pact = {}, filter = {} } = input;
  const defaults = CONFIG_DEFAULTS;
  return {
    provider: {
      name: provider.name ?? defaults.provider.name,
      base_url: provider.base_url ?? defaults.provider.base_url,
      ...(provider.timeout_ms !== undefined ? { timeout_ms: provider.timeout_ms } : {}),
    },
    consumer: { name: consumer.name ?? defaults.consumer.name },
    pact: {
      uri: pact.uri ?? defaults.pact.uri,
      ...(pact.username !== undefined ? { username: pact.username } : {}),
      ...(pact.password !== undefined ? { password: pact.password } : {}),
    },
    filter: {
      description: filter.description ?? defaults.filter.description,
      state: filter.state ?? defaults.filter.state,
    },
  };
}
