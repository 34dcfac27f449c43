/**
 * Shared helpers for pactcheck tests.
 */
import fs from 'fs';
import path from 'path';
import os from 'os';
import type { Logger } from 'pino';
import { createRootLogger } from '../../src/shared/logger';
import type { ActualResponse, HttpClient, Interaction } from '../../src/shared/types';

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'pactcheck-test-'));
}

/** Absolute path of a file under test/fixtures/. */
export function fixturePath(relativePath: string): string {
  return path.resolve(__dirname, '../fixtures', relativePath);
}

export function loadFixture(relativePath: string): string {
  return fs.readFileSync(fixturePath(relativePath), 'utf-8');
}

export function silentLogger(): Logger {
  return createRootLogger(undefined, 'silent');
}

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

export function makeInteraction(overrides: Partial<Interaction> = {}): Interaction {
  return {
    description: 'a request for order 42',
    providerState: null,
    request: { method: 'GET', path: '/orders/42', query: {}, headers: {} },
    response: { status: 200, headers: {}, body: { id: 42 }, matchingRules: {} },
    ...overrides,
  };
}

export function makeActual(overrides: Partial<ActualResponse> = {}): ActualResponse {
  return {
    status: 200,
    headers: { 'content-type': 'application/json' },
    rawBody: '{"id":42}',
    body: { id: 42 },
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export interface RecordedCall {
  url: string;
  init: RequestInit;
}

/** HttpClient fake that records every call and answers from `handler`. */
export function fakeClient(
  handler: (url: string, init: RequestInit) => Response | Promise<Response>,
): { client: HttpClient; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const client: HttpClient = async (url, init) => {
    calls.push({ url, init });
    return handler(url, init);
  };
  return { client, calls };
}

export function pactJson(interactions: unknown[], consumer = 'web-shop', provider = 'orders-api'): string {
  return JSON.stringify({
    consumer: { name: consumer },
    provider: { name: provider },
    interactions,
  });
}

/** Raw (pre-normalisation) interaction as it appears in a pact file. */
export function rawInteraction(
  description: string,
  providerState?: string,
  response: Record<string, unknown> = { status: 200, body: { id: 42 } },
): Record<string, unknown> {
  return {
    description,
    ...(providerState === undefined ? {} : { providerState }),
    request: { method: 'GET', path: '/orders/42' },
    response,
  };
}
