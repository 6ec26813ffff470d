/**
 * Verification Types
 *
 * Verdicts for (operation, invariant) pairs, the load-time report and the
 * runtime violation records.
 */

import type { Value } from '../model/types.js';

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

export type ProofReason = 'frame' | 'discharged';

/** A concrete binding under which an operation breaks an invariant. */
export interface Witness {
  before: Record<string, Value[]>;
  params: Record<string, Value>;
  after: Record<string, Value[]>;
  /** Rendered with the expression printer's value syntax. */
  description: string;
}

export type Verdict =
  | { status: 'unchecked' }
  | { status: 'proven'; reason: ProofReason }
  | { status: 'disproven'; witness: Witness }
  | { status: 'inconclusive'; obligation: string; detail?: string };

export type VerdictStatus = Verdict['status'];

export interface PairResult {
  operation: string;
  invariant: string;
  verdict: Verdict;
  duration: number;
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export interface OperationSummary {
  proven: string[];
  disproven: string[];
  inconclusive: string[];
}

export interface VerificationReport {
  schema: string;
  pairs: PairResult[];
  operations: Record<string, OperationSummary>;
  duration: number;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface CounterexampleOptions {
  enabled: boolean;
  samples: number;
  poolSize: number;
  maxBagSize: number;
  seed: number;
}

export interface VerifierOptions {
  instantiationRounds: number;
  caseSplitDepth: number;
  maxPaths: number;
  counterexample: CounterexampleOptions;
}

// ---------------------------------------------------------------------------
// Runtime violations
// ---------------------------------------------------------------------------

export interface InvariantViolation {
  id: string;
  invariant: string;
  /** Printed formula. */
  expression: string;
  /** Operation whose working copy failed the check, if any. */
  operation?: string;
  error?: string;
  timestamp: number;
}
