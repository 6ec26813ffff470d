/**
 * Invariant verification: static preservation proofs per (operation,
 * invariant) pair, counterexample search and the runtime monitor.
 *
 * @example
 * ```typescript
 * import { InvariantVerifier } from 'bagcheck';
 *
 * const report = new InvariantVerifier(schema).verify();
 * console.log(report.operations.insertVote.disproven); // []
 * ```
 */

export { InvariantVerifier, DEFAULT_VERIFIER_OPTIONS } from './invariant-verifier.js';
export { InvariantMonitor } from './invariant-monitor.js';
export type { InvariantCheck } from './invariant-monitor.js';
export { CounterexampleSearch } from './counterexample.js';
export { Prover } from './prover.js';
export type { ProverOptions } from './prover.js';
export { effectPaths } from './paths.js';
export type { EffectPath } from './paths.js';
export { expandPostState } from './post-state.js';
export type { Polarity } from './post-state.js';
export type { Formula } from './normalize.js';
export type {
  Verdict,
  VerdictStatus,
  ProofReason,
  PairResult,
  OperationSummary,
  VerificationReport,
  VerifierOptions,
  CounterexampleOptions,
  InvariantViolation,
  Witness,
} from './types.js';
