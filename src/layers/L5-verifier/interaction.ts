import type { Logger } from 'pino';
import {
  PactCheckError,
  errorMessage,
  type Interaction,
  type InteractionVerdict,
  type Mismatch,
} from '../../shared/types';
import type { StateCoordinator } from '../L2-state-coordinator';
import type { ProviderInvoker } from '../L3-provider-invoker';
import { matchResponse } from '../L4-response-matcher';

export interface InteractionDeps {
  coordinator: StateCoordinator;
  invoker: ProviderInvoker;
  logger: Logger;
}

/**
 * SettingUp → Invoking → Matching → TearingDown for one interaction.
 * Failures are captured on the verdict; only programming errors escape.
 * Teardown runs exactly once whenever setup succeeded.
 */
export async function verifyInteraction(
  interaction: Interaction,
  deps: InteractionDeps,
): Promise<InteractionVerdict> {
  const { coordinator, invoker } = deps;
  const log = deps.logger.child({
    interaction: interaction.description,
    providerState: interaction.providerState,
  });
  const startTime = Date.now();
  const errors: PactCheckError[] = [];
  let mismatches: Mismatch[] = [];
  let matched = false;

  try {
    await coordinator.setup(interaction.providerState);
  } catch (err) {
    errors.push(asPactCheckError(err, 'SETUP_FAILED'));
    log.error({ err }, 'Provider state setup failed, interaction skipped');
    return finish();
  }

  for (const [path, set] of Object.entries(interaction.response.matchingRules)) {
    for (const rule of set.matchers) {
      if (rule.declaredMatch !== undefined) {
        log.debug({ path, matcher: rule.declaredMatch }, 'Unsupported matcher, comparing by type');
      }
    }
  }

  try {
    const actual = await invoker.invoke(interaction.request);
    const result = matchResponse(interaction.response, actual);
    matched = result.matched;
    mismatches = result.mismatches;
    if (!matched) {
      errors.push(
        new PactCheckError({
          code: 'MISMATCH_FOUND',
          message: `${mismatches.length} mismatch${mismatches.length === 1 ? '' : 'es'} in response to '${interaction.description}'`,
          context: { interaction: interaction.description },
        }),
      );
    }
  } catch (err) {
    errors.push(asPactCheckError(err, 'TRANSPORT_ERROR'));
    log.error({ err }, 'Request to provider failed');
  }

  try {
    await coordinator.teardown(interaction.providerState);
  } catch (err) {
    errors.push(asPactCheckError(err, 'TEARDOWN_FAILED'));
    log.error({ err }, 'Provider state teardown failed');
  }

  return finish();

  function finish(): InteractionVerdict {
    const verdict: InteractionVerdict = {
      description: interaction.description,
      providerState: interaction.providerState,
      matched,
      mismatches,
      errors,
      passed: matched && errors.length === 0,
      durationMs: Date.now() - startTime,
    };
    if (verdict.passed) {
      log.info({ durationMs: verdict.durationMs }, 'Interaction verified');
    } else {
      log.warn(
        { mismatches: mismatches.map((m) => `${m.path}: ${m.message}`), errors: errors.map((e) => e.code) },
        'Interaction failed verification',
      );
    }
    return verdict;
  }
}

function asPactCheckError(err: unknown, code: 'SETUP_FAILED' | 'TRANSPORT_ERROR' | 'TEARDOWN_FAILED'): PactCheckError {
  if (err instanceof PactCheckError) return err;
  return new PactCheckError({ code, message: errorMessage(err), cause: err });
}
