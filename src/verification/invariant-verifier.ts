/**
 * InvariantVerifier — static preservation check
 *
 * Decides, once per schema load, whether every operation preserves every
 * invariant: for all states S and parameters p,
 *
 *   Inv(S) and Pre(p, S)  =>  Inv(Apply(op, p, S))
 *
 * Pairs are settled by the frame rule when the operation writes nothing the
 * invariant reads; otherwise each effect path's post-state obligation goes
 * to the prover. Undischarged obligations fall through to a small-scope
 * counterexample search before being reported inconclusive.
 */

import { UnsupportedFragmentError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { EventBus } from '../core/events.js';
import { and, implies } from '../lang/builders.js';
import { printExpr } from '../lang/printer.js';
import { effectWrites, freshen, stateReads, substituteState } from '../lang/transform.js';
import type { Expr } from '../lang/ast.js';
import type { InvariantDecl, OperationDecl, Schema } from '../model/schema.js';
import { CounterexampleSearch } from './counterexample.js';
import { toNnf } from './normalize.js';
import type { Formula } from './normalize.js';
import { effectPaths } from './paths.js';
import { expandPostState } from './post-state.js';
import { Prover } from './prover.js';
import type { OperationSummary, PairResult, Verdict, VerificationReport, VerifierOptions, Witness } from './types.js';

// ═══════════════════════════════════════════════════════════════
// DEFAULT CONFIG
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_VERIFIER_OPTIONS: VerifierOptions = {
  instantiationRounds: 4,
  caseSplitDepth: 4,
  maxPaths: 16,
  counterexample: {
    enabled: true,
    samples: 400,
    poolSize: 2,
    maxBagSize: 2,
    seed: 7,
  },
};

// ═══════════════════════════════════════════════════════════════
// INVARIANT VERIFIER
// ═══════════════════════════════════════════════════════════════

export class InvariantVerifier {
  private readonly options: VerifierOptions;
  private readonly prover: Prover;
  private readonly search: CounterexampleSearch;
  private logger = getLogger();

  constructor(
    private readonly schema: Schema,
    options?: Partial<VerifierOptions>,
    private readonly events?: EventBus,
  ) {
    this.options = { ...DEFAULT_VERIFIER_OPTIONS, ...options };
    this.prover = new Prover(this.options);
    this.search = new CounterexampleSearch(schema, this.options.counterexample);
  }

  // ---------------------------------------------------------------------------
  // Verification
  // ---------------------------------------------------------------------------

  /** Decide every (operation, invariant) pair of the schema. */
  verify(): VerificationReport {
    const start = performance.now();
    const pairs: PairResult[] = [];
    const operations: Record<string, OperationSummary> = {};

    for (const op of this.schema.operations) {
      const summary: OperationSummary = { proven: [], disproven: [], inconclusive: [] };
      for (const inv of this.schema.invariants) {
        const pairStart = performance.now();
        const verdict = this.verifyPair(op, inv);
        const duration = performance.now() - pairStart;
        pairs.push({ operation: op.name, invariant: inv.name, verdict, duration });

        const witness = verdict.status === 'disproven' ? verdict.witness : undefined;
        if (verdict.status === 'proven') summary.proven.push(inv.name);
        else if (verdict.status === 'disproven') summary.disproven.push(inv.name);
        else if (verdict.status === 'inconclusive') summary.inconclusive.push(inv.name);

        this.logVerdict(op.name, inv.name, verdict);
        this.events?.emit('verify:pair:decided', {
          operation: op.name,
          invariant: inv.name,
          status: verdict.status,
          witness,
        });
      }
      operations[op.name] = summary;
    }

    const report: VerificationReport = {
      schema: this.schema.name,
      pairs,
      operations,
      duration: performance.now() - start,
    };
    this.logger.info(
      {
        schema: this.schema.name,
        pairs: pairs.length,
        disproven: pairs.filter((p) => p.verdict.status === 'disproven').length,
        inconclusive: pairs.filter((p) => p.verdict.status === 'inconclusive').length,
        duration: Math.round(report.duration),
      },
      'Schema verified',
    );
    return report;
  }

  /** Decide whether `op` preserves `inv`. */
  verifyPair(op: OperationDecl, inv: InvariantDecl): Verdict {
    const writes = effectWrites(op.effects);
    if (![...stateReads(inv.formula)].some((name) => writes.has(name))) {
      return { status: 'proven', reason: 'frame' };
    }

    let obligation = printExpr(implies(op.assume, inv.formula));
    let detail: string | undefined;
    try {
      const open = this.undischarged(op, inv);
      if (open === null) return { status: 'proven', reason: 'discharged' };
      obligation = printExpr(open);
    } catch (err) {
      if (!(err instanceof UnsupportedFragmentError)) throw err;
      detail = err.message;
    }

    const witness = this.counterexample(op, inv);
    if (witness) return { status: 'disproven', witness };
    return { status: 'inconclusive', obligation, detail };
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /** The first path obligation the prover cannot discharge, or null. */
  private undischarged(op: OperationDecl, inv: InvariantDecl): Expr | null {
    const paths = effectPaths(op.effects, this.options.maxPaths);
    const base = [...this.schema.invariants.map((i) => i.formula), op.assume]
      .map((e) => this.hypothesis(e))
      .filter((f): f is Formula => f !== null);

    for (const path of paths) {
      const post = substituteState(freshen(inv.formula), path.post);
      const goal = toNnf(expandPostState(post, 'pos'));
      const guards = path.guards.map((g) => this.hypothesis(g)).filter((f): f is Formula => f !== null);
      if (!this.prover.prove([...base, ...guards], goal)) {
        return implies(and(op.assume, ...path.guards), post);
      }
    }
    return null;
  }

  /** Hypotheses may only be weakened; one outside the fragment is dropped. */
  private hypothesis(e: Expr): Formula | null {
    try {
      return toNnf(expandPostState(freshen(e), 'neg'));
    } catch (err) {
      if (err instanceof UnsupportedFragmentError) return null;
      throw err;
    }
  }

  private counterexample(op: OperationDecl, inv: InvariantDecl): Witness | null {
    try {
      return this.search.search(op, inv);
    } catch (err) {
      if (!(err instanceof UnsupportedFragmentError)) throw err;
      this.logger.debug({ operation: op.name, invariant: inv.name, reason: err.message }, 'Counterexample search skipped');
      return null;
    }
  }

  private logVerdict(operation: string, invariant: string, verdict: Verdict): void {
    switch (verdict.status) {
      case 'proven':
        this.logger.debug({ operation, invariant, reason: verdict.reason }, 'Invariant preserved');
        break;
      case 'disproven':
        this.logger.warn({ operation, invariant, witness: verdict.witness.description }, 'Invariant disproven');
        break;
      case 'inconclusive':
        this.logger.warn({ operation, invariant, obligation: verdict.obligation, detail: verdict.detail }, 'Verdict inconclusive');
        break;
      default:
        break;
    }
  }
}
