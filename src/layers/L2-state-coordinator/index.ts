import type { Logger } from 'pino';
import { PactCheckError, errorMessage, type Action, type StateAction } from '../../shared/types';
import { createLogger } from '../../shared/logger';

export type Precondition = () => PactCheckError | null;

export interface StateCoordinatorOptions {
  /** Runs before every interaction, ahead of its state setup. */
  beforeEach?: Action;
  /**
   * Runs after every interaction whose beforeEach hook succeeded: after its
   * state teardown, or right after a failed state setup.
   */
  afterEach?: Action;
  logger?: Logger;
}

/**
 * Provider-state actions keyed by label. Registration happens before a run;
 * during a run the map is only read.
 */
export class StateCoordinator {
  private readonly actions = new Map<string, StateAction>();
  private readonly preconditions: Precondition[] = [];
  private readonly log: Logger;

  constructor(private readonly options: StateCoordinatorOptions = {}) {
    this.log = options.logger ?? createLogger({ component: 'state-coordinator' });
  }

  /** Empty labels are ignored so registration can stay chained. */
  register(label: string, setup?: Action, teardown?: Action): this {
    if (label !== '') {
      this.actions.set(label, { setup, teardown });
    }
    return this;
  }

  has(label: string): boolean {
    return this.actions.has(label);
  }

  labels(): string[] {
    return [...this.actions.keys()];
  }

  /** Independent copy of the registered actions, hooks and preconditions. */
  snapshot(): StateCoordinator {
    const copy = new StateCoordinator(this.options);
    for (const [label, action] of this.actions) copy.actions.set(label, { ...action });
    copy.preconditions.push(...this.preconditions);
    return copy;
  }

  addPrecondition(check: Precondition): this {
    this.preconditions.push(check);
    return this;
  }

  /** First failing precondition, or null when the coordinator can run. */
  canValidate(): PactCheckError | null {
    for (const check of this.preconditions) {
      const err = check();
      if (err) return err;
    }
    return null;
  }

  /**
   * Runs beforeEach, then the state setup. When the state setup fails the
   * afterEach hook still runs, since its beforeEach did; the setup failure is
   * rethrown.
   */
  async setup(label: string | null): Promise<void> {
    await this.runStep('SETUP_FAILED', 'beforeEach hook', label, this.options.beforeEach);

    if (label && !this.has(label)) {
      this.log.debug(
        { providerState: label, registered: this.labels() },
        'No state action registered, continuing without setup',
      );
      return;
    }

    const action = label ? this.actions.get(label) : undefined;
    try {
      await this.runStep('SETUP_FAILED', 'state setup', label, action?.setup);
    } catch (err) {
      try {
        await this.runStep('TEARDOWN_FAILED', 'afterEach hook', label, this.options.afterEach);
      } catch (hookErr) {
        this.log.error({ providerState: label, err: hookErr }, 'afterEach hook failed after a failed setup');
      }
      throw err;
    }
  }

  /**
   * Runs the state teardown, then the afterEach hook even when the teardown
   * failed. The first failure is rethrown.
   */
  async teardown(label: string | null): Promise<void> {
    const action = label ? this.actions.get(label) : undefined;
    let failure: PactCheckError | null = null;

    try {
      await this.runStep('TEARDOWN_FAILED', 'state teardown', label, action?.teardown);
    } catch (err) {
      failure = toPactCheckError(err);
    }

    try {
      await this.runStep('TEARDOWN_FAILED', 'afterEach hook', label, this.options.afterEach);
    } catch (err) {
      if (failure) {
        this.log.error({ providerState: label, err }, 'afterEach hook failed after a failed teardown');
      } else {
        failure = toPactCheckError(err);
      }
    }

    if (failure) throw failure;
  }

  private async runStep(
    code: 'SETUP_FAILED' | 'TEARDOWN_FAILED',
    step: string,
    label: string | null,
    action: Action | undefined,
  ): Promise<void> {
    if (!action) return;
    try {
      await action();
    } catch (err) {
      throw new PactCheckError({
        code,
        message: label
          ? `${capitalize(step)} failed for provider state '${label}': ${errorMessage(err)}`
          : `${capitalize(step)} failed: ${errorMessage(err)}`,
        context: { providerState: label ?? undefined },
        cause: err,
      });
    }
  }
}

function toPactCheckError(err: unknown): PactCheckError {
  return err instanceof PactCheckError
    ? err
    : new PactCheckError({ code: 'TEARDOWN_FAILED', message: errorMessage(err), cause: err });
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
