import fs from 'fs';
import { fileURLToPath } from 'url';
import type { Logger } from 'pino';
import {
  PactCheckError,
  errorMessage,
  type HttpClient,
  type PactCredentials,
  type PactDocument,
} from '../../shared/types';
import { createLogger } from '../../shared/logger';
import { parsePactDocument } from './document';

export type PactSource =
  | { kind: 'local'; path: string }
  | { kind: 'remote'; url: string; credentials: PactCredentials | null };

export interface PactReader {
  readonly source: PactSource;
  read(): Promise<PactDocument>;
}

export interface PactReaderOptions {
  /** Client used for remote sources. Defaults to the global fetch. */
  fetch?: HttpClient;
  logger?: Logger;
}

export function isWebUri(uri: string): boolean {
  try {
    const { protocol } = new URL(uri);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

export function resolvePactSource(uri: string, credentials?: PactCredentials | null): PactSource {
  if (isWebUri(uri)) {
    return { kind: 'remote', url: uri, credentials: credentials ?? null };
  }
  const path = uri.startsWith('file:') ? fileURLToPath(uri) : uri;
  return { kind: 'local', path };
}

export function basicAuthHeader(credentials: PactCredentials): string {
  const token = Buffer.from(`${credentials.username}:${credentials.password}`, 'utf-8').toString('base64');
  return `Basic ${token}`;
}

export function createPactReader(source: PactSource, options: PactReaderOptions = {}): PactReader {
  const log = options.logger ?? createLogger({ component: 'pact-source' });

  switch (source.kind) {
    case 'local':
      return {
        source,
        async read() {
          const raw = await readLocal(source.path);
          log.debug({ path: source.path, bytes: raw.length }, 'Read pact file');
          return parsePactDocument(raw, source.path);
        },
      };

    case 'remote':
      return {
        source,
        async read() {
          const raw = await readRemote(source.url, source.credentials, options.fetch ?? globalThis.fetch);
          log.debug({ url: source.url, bytes: raw.length }, 'Fetched pact document');
          return parsePactDocument(raw, source.url);
        },
      };
  }
}

/**
 * Resolve a pact URI and read it once. No retries: a failed read is
 * SOURCE_UNAVAILABLE.
 */
export async function fetchPactDocument(
  uri: string,
  credentials?: PactCredentials | null,
  options: PactReaderOptions = {},
): Promise<PactDocument> {
  if (uri.trim() === '') {
    throw new PactCheckError({
      code: 'SOURCE_UNAVAILABLE',
      message: 'No pact URI configured. Set one with pactUri() or --pact.',
    });
  }
  return createPactReader(resolvePactSource(uri, credentials), options).read();
}

async function readLocal(path: string): Promise<string> {
  try {
    return await fs.promises.readFile(path, 'utf-8');
  } catch (err) {
    throw new PactCheckError({
      code: 'SOURCE_UNAVAILABLE',
      message: `Could not read pact file '${path}': ${errorMessage(err)}`,
      context: { uri: path },
      cause: err,
    });
  }
}

async function readRemote(
  url: string,
  credentials: PactCredentials | null,
  client: HttpClient,
): Promise<string> {
  const headers: Record<string, string> = { Accept: 'application/hal+json, application/json' };
  if (credentials) {
    headers.Authorization = basicAuthHeader(credentials);
  }

  let response: Response;
  let body: string;
  try {
    response = await client(url, { method: 'GET', headers });
    body = await response.text();
  } catch (err) {
    throw new PactCheckError({
      code: 'SOURCE_UNAVAILABLE',
      message: `Could not fetch pact from '${url}': ${errorMessage(err)}`,
      context: { uri: url },
      cause: err,
    });
  }

  if (!response.ok) {
    throw new PactCheckError({
      code: 'SOURCE_UNAVAILABLE',
      message: `Could not fetch pact from '${url}': HTTP ${response.status}`,
      context: { uri: url, status: response.status },
    });
  }
  return body;
}
