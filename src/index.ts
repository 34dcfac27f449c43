export { PactVerifier, verifyInteraction } from './layers/L5-verifier';
export type { PactVerifierOptions, VerifierPhase } from './layers/L5-verifier';
export {
  fetchPactDocument,
  createPactReader,
  resolvePactSource,
  parsePactDocument,
  isWebUri,
} from './layers/L0-pact-source';
export type { PactSource, PactReader, PactReaderOptions } from './layers/L0-pact-source';
export { selectInteractions } from './layers/L1-interaction-selector';
export { StateCoordinator } from './layers/L2-state-coordinator';
export type { Precondition, StateCoordinatorOptions } from './layers/L2-state-coordinator';
export { ProviderInvoker, withTimeout } from './layers/L3-provider-invoker';
export { matchResponse } from './layers/L4-response-matcher';
export { createLogger, createRootLogger } from './shared/logger';
export { loadConfig, loadPactCheckConfig } from './config';
export * from './shared/types';
