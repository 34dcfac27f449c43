import {
  PactCheckError,
  errorMessage,
  type ActualResponse,
  type ExpectedRequest,
  type HttpClient,
} from '../../shared/types';

const JSON_CONTENT_TYPE = /^application\/(?:[\w.+-]+\+)?json\b/i;

/**
 * Replays expected requests against the provider under test.
 * One attempt per request; a failure is reported, never retried.
 */
export class ProviderInvoker {
  readonly baseUrl: string;

  constructor(
    baseUrl: string | URL,
    private readonly client: HttpClient = globalThis.fetch,
  ) {
    this.baseUrl = String(baseUrl).replace(/\/+$/, '');
  }

  buildUrl(request: ExpectedRequest): string {
    const params = new URLSearchParams();
    for (const [key, values] of Object.entries(request.query)) {
      for (const value of values) params.append(key, value);
    }
    const search = params.toString();
    return `${this.baseUrl}${request.path}${search ? `?${search}` : ''}`;
  }

  buildInit(request: ExpectedRequest): RequestInit {
    const headers: Record<string, string> = { ...request.headers };
    const init: RequestInit = { method: request.method, headers, redirect: 'manual' };

    if (request.body === undefined) return init;

    if (typeof request.body === 'string') {
      init.body = request.body;
    } else {
      init.body = JSON.stringify(request.body);
      if (!Object.keys(headers).some((name) => name.toLowerCase() === 'content-type')) {
        headers['Content-Type'] = 'application/json';
      }
    }
    return init;
  }

  async invoke(request: ExpectedRequest): Promise<ActualResponse> {
    const url = this.buildUrl(request);
    try {
      const response = await this.client(url, this.buildInit(request));
      return await readResponse(response);
    } catch (err) {
      throw new PactCheckError({
        code: 'TRANSPORT_ERROR',
        message: `${request.method} ${url} failed: ${errorMessage(err)}`,
        cause: err,
      });
    }
  }
}

export async function readResponse(response: Response): Promise<ActualResponse> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name.toLowerCase()] = value;
  });

  const rawBody = await response.text();
  return {
    status: response.status,
    headers,
    rawBody,
    body: parseBody(rawBody, headers['content-type']),
  };
}

function parseBody(rawBody: string, contentType: string | undefined): unknown {
  if (rawBody === '' || !contentType || !JSON_CONTENT_TYPE.test(contentType)) {
    return rawBody;
  }
  try {
    return JSON.parse(rawBody);
  } catch {
    // left as text; the matcher reports the difference
    return rawBody;
  }
}

/** Wrap a client so each call aborts after `timeoutMs`. */
export function withTimeout(client: HttpClient, timeoutMs: number): HttpClient {
  return (url, init) => client(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
}
