export { PactVerifier } from './verifier';
export type { PactVerifierOptions, VerifierPhase } from './verifier';
export { verifyInteraction } from './interaction';
export type { InteractionDeps } from './interaction';
