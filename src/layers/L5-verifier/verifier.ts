import type { Logger } from 'pino';
import {
  PactCheckError,
  type Action,
  type HttpClient,
  type InteractionVerdict,
  type PactCredentials,
  type VerificationReport,
} from '../../shared/types';
import { createLogger } from '../../shared/logger';
import { fetchPactDocument } from '../L0-pact-source';
import { selectInteractions } from '../L1-interaction-selector';
import { StateCoordinator } from '../L2-state-coordinator';
import { ProviderInvoker } from '../L3-provider-invoker';
import { verifyInteraction } from './interaction';

export type VerifierPhase = 'idle' | 'validating' | 'fetching' | 'selecting' | 'verifying' | 'aggregated';

export interface PactVerifierOptions {
  /** Runs before every interaction, ahead of its provider-state setup. */
  beforeEach?: Action;
  /** Runs after every interaction whose beforeEach hook succeeded, even when its state setup failed. */
  afterEach?: Action;
  logger?: Logger;
  /** Client used to fetch remote pact documents. Defaults to the global fetch. */
  sourceClient?: HttpClient;
}

/**
 * Verifies a provider against the interactions a consumer recorded.
 *
 * Configuration is chainable and validated lazily, so one verifier can be
 * reused for several filtered runs:
 *
 *   await new PactVerifier()
 *     .serviceProvider('orders-api', 'http://localhost:3000')
 *     .honoursPactWith('web-shop')
 *     .pactUri('./pacts/web-shop-orders-api.json')
 *     .providerState('an order exists', seedOrder, clearOrders)
 *     .verify();
 */
export class PactVerifier {
  private providerName = '';
  private consumerName = '';
  private uri = '';
  private credentials: PactCredentials | null = null;
  private invoker: ProviderInvoker | null = null;
  private phase: VerifierPhase = 'idle';
  private readonly coordinator: StateCoordinator;
  private readonly log: Logger;

  constructor(private readonly options: PactVerifierOptions = {}) {
    this.log = options.logger ?? createLogger({ component: 'verifier' });
    this.coordinator = new StateCoordinator({
      beforeEach: options.beforeEach,
      afterEach: options.afterEach,
      logger: this.log,
    });
    this.coordinator.addPrecondition(() => this.checkProviderTarget());
  }

  get currentPhase(): VerifierPhase {
    return this.phase;
  }

  serviceProvider(name: string, baseUrl: string | URL, client?: HttpClient): this {
    this.providerName = name;
    this.invoker = new ProviderInvoker(baseUrl, client);
    return this;
  }

  honoursPactWith(consumerName: string): this {
    this.consumerName = consumerName;
    return this;
  }

  /** Register setup/teardown for a provider state. Last registration for a label wins. */
  providerState(state: string, setup?: Action, teardown?: Action): this {
    this.coordinator.register(state, setup, teardown);
    return this;
  }

  pactUri(uri: string, credentials?: PactCredentials | null): this {
    this.uri = uri;
    this.credentials = credentials ?? null;
    return this;
  }

  /** Verify every interaction in the pact. */
  async verify(): Promise<VerificationReport> {
    return this.verifyState('', '');
  }

  /**
   * Verify the interactions matching the filters. Resolves with the report
   * when all of them pass; otherwise rejects with VERIFICATION_FAILED and
   * leaves the detail to the log.
   */
  async verifyState(description = '', state = ''): Promise<VerificationReport> {
    const report = await this.run(description, state);
    if (!report.success) {
      throw new PactCheckError({
        code: 'VERIFICATION_FAILED',
        message: 'Failed to verify the pact, please see the log for more details.',
      });
    }
    return report;
  }

  /**
   * Run a verification and return the report whatever the verdicts.
   * Configuration, source and selection errors are thrown before any
   * interaction is attempted.
   */
  async run(description = '', state = ''): Promise<VerificationReport> {
    const startTime = Date.now();
    try {
      this.enter('validating');
      const { invoker, coordinator } = this.validate();

      this.enter('fetching');
      const doc = await fetchPactDocument(this.uri, this.credentials, {
        fetch: this.options.sourceClient,
        logger: this.log.child({ component: 'pact-source' }),
      });
      if (doc.consumer !== this.consumerName || doc.provider !== this.providerName) {
        this.log.warn(
          {
            expected: { consumer: this.consumerName, provider: this.providerName },
            document: { consumer: doc.consumer, provider: doc.provider },
          },
          'Pact document names a different consumer or provider',
        );
      }

      this.enter('selecting');
      const interactions = selectInteractions(doc.interactions, description, state);

      this.enter('verifying');
      const verdicts: InteractionVerdict[] = [];
      for (const interaction of interactions) {
        verdicts.push(await verifyInteraction(interaction, { coordinator, invoker, logger: this.log }));
      }

      this.enter('aggregated');
      const report: VerificationReport = {
        consumer: this.consumerName,
        provider: this.providerName,
        success: verdicts.every((v) => v.passed),
        verdicts,
        durationMs: Date.now() - startTime,
      };
      this.log.info(
        {
          consumer: report.consumer,
          provider: report.provider,
          total: verdicts.length,
          failed: verdicts.filter((v) => !v.passed).length,
          durationMs: report.durationMs,
        },
        report.success ? 'Pact verified' : 'Pact verification failed',
      );
      return report;
    } catch (err) {
      this.log.error({ err, phase: this.phase }, 'Verification aborted');
      throw err;
    } finally {
      this.phase = 'idle';
    }
  }

  private enter(phase: VerifierPhase): void {
    this.phase = phase;
    this.log.debug({ phase }, 'Verifier phase');
  }

  private validate(): { invoker: ProviderInvoker; coordinator: StateCoordinator } {
    if (this.consumerName === '') {
      throw new PactCheckError({
        code: 'EMPTY_CONSUMER',
        message: 'Consumer name cannot be empty, please provide a valid value using honoursPactWith().',
      });
    }
    if (this.providerName === '') {
      throw new PactCheckError({
        code: 'EMPTY_PROVIDER',
        message: 'Provider name cannot be empty, please provide a valid value using serviceProvider().',
      });
    }

    const failure = this.coordinator.canValidate();
    if (failure) throw failure;

    // checkProviderTarget guarantees this
    const invoker = this.invoker;
    if (!invoker) throw this.providerNotConfigured('No provider configured.');

    return { invoker, coordinator: this.coordinator.snapshot() };
  }

  private checkProviderTarget(): PactCheckError | null {
    if (!this.invoker) {
      return this.providerNotConfigured('No provider configured, please call serviceProvider() first.');
    }
    try {
      new URL(this.invoker.baseUrl);
    } catch {
      return this.providerNotConfigured(`Provider base URL '${this.invoker.baseUrl}' is not a valid URL.`);
    }
    return null;
  }

  private providerNotConfigured(message: string): PactCheckError {
    return new PactCheckError({ code: 'PROVIDER_NOT_CONFIGURED', message });
  }
}
