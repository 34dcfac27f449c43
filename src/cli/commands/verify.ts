/**
 * `pactcheck verify`: replay a pact against a running provider.
 *
 * Precedence: flags, then .pactcheck.yml, then environment.
 */

import type { Logger } from 'pino';
import { loadConfig, loadPactCheckConfig } from '../../config';
import { PactVerifier } from '../../layers/L5-verifier';
import { withTimeout } from '../../layers/L3-provider-invoker';
import { createLogger } from '../../shared/logger';
import { errorMessage, isPactCheckError, type HttpClient, type PactCredentials } from '../../shared/types';
import { formatReport, toJsonReport } from '../output';

export interface VerifyOptions {
  pact?: string;
  provider?: string;
  consumer?: string;
  baseUrl?: string;
  description?: string;
  state?: string;
  config?: string;
  timeout?: string;
  json?: boolean;
}

export interface VerifyDeps {
  env?: Record<string, string | undefined>;
  logger?: Logger;
  /** Client for provider requests. Defaults to the global fetch. */
  providerClient?: HttpClient;
  /** Client for remote pact documents. Defaults to the global fetch. */
  sourceClient?: HttpClient;
}

export async function runVerify(
  options: VerifyOptions = {},
  write: (msg: string) => void = console.log,
  deps: VerifyDeps = {},
): Promise<number> {
  const logger = deps.logger ?? createLogger({ component: 'cli' });
  const fail = (code: string, message: string): number => {
    write(options.json ? JSON.stringify({ success: false, error: { code, message } }, null, 2) : `Error: ${message}`);
    return 2;
  };

  try {
    const env = loadConfig(deps.env ?? process.env);
    logger.level = env.log_level;
    const { config, warnings } = loadPactCheckConfig(options.config);
    for (const warning of warnings) {
      logger.warn({ field: warning.field }, warning.message);
      if (!options.json) write(`Warning: ${warning.message}`);
    }

    let timeoutMs = config.provider.timeout_ms ?? env.timeout_ms;
    if (options.timeout !== undefined) {
      timeoutMs = Number(options.timeout);
      if (options.timeout.trim() === '' || !Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        return fail(
          'INVALID_CONFIG',
          `--timeout must be a positive number of milliseconds, got "${options.timeout}".`,
        );
      }
    }

    const username = config.pact.username ?? env.broker_username;
    const password = config.pact.password ?? env.broker_password;
    const credentials: PactCredentials | null =
      username !== undefined && password !== undefined ? { username, password } : null;

    const verifier = new PactVerifier({ logger, sourceClient: deps.sourceClient })
      .serviceProvider(
        options.provider ?? config.provider.name,
        options.baseUrl ?? config.provider.base_url,
        withTimeout(deps.providerClient ?? globalThis.fetch, timeoutMs),
      )
      .honoursPactWith(options.consumer ?? config.consumer.name)
      .pactUri(options.pact ?? config.pact.uri, credentials);

    const report = await verifier.run(
      options.description ?? config.filter.description,
      options.state ?? config.filter.state,
    );

    write(options.json ? JSON.stringify(toJsonReport(report), null, 2) : formatReport(report));
    return report.success ? 0 : 1;
  } catch (err) {
    return fail(isPactCheckError(err) ? err.code : 'UNEXPECTED_ERROR', errorMessage(err));
  }
}
