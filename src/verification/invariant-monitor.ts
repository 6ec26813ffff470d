/**
 * InvariantMonitor — Runtime Invariant Checker
 *
 * Evaluates a schema's invariants against a concrete state. The executor uses
 * it as a safety net for operations the verifier could not decide, and
 * `SchemaEngine.auditState` uses it to check seeded data. Failures are
 * recorded as violations (capped history), passed to handlers and emitted on
 * the event bus.
 */

import { nanoid } from 'nanoid';
import { EvaluationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { EventBus } from '../core/events.js';
import { Environment } from '../eval/environment.js';
import { Evaluator } from '../eval/evaluator.js';
import { printExpr } from '../lang/printer.js';
import type { InvariantDecl } from '../model/schema.js';
import type { StateView } from '../eval/environment.js';
import type { InvariantViolation } from './types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface InvariantCheck {
  invariant: string;
  passed: boolean;
  error?: string;
}

type ViolationHandler = (violation: InvariantViolation) => void;

// ═══════════════════════════════════════════════════════════════
// INVARIANT MONITOR
// ═══════════════════════════════════════════════════════════════

export class InvariantMonitor {
  private violations: InvariantViolation[] = [];
  private violationHandlers: ViolationHandler[] = [];
  private maxViolations: number;
  private readonly evaluator: Evaluator;
  private readonly events: EventBus | undefined;
  private logger = getLogger();

  constructor(
    private readonly invariants: readonly InvariantDecl[],
    options?: { maxViolations?: number; events?: EventBus; evaluator?: Evaluator },
  ) {
    this.maxViolations = options?.maxViolations ?? 1000;
    this.events = options?.events;
    this.evaluator = options?.evaluator ?? new Evaluator();
  }

  // ---------------------------------------------------------------------------
  // Checking
  // ---------------------------------------------------------------------------

  /**
   * Check every invariant against `state`. An invariant whose evaluation
   * fails counts as violated.
   */
  check(state: StateView, operation?: string): InvariantCheck[] {
    const env = Environment.of(state);
    const results: InvariantCheck[] = [];

    for (const inv of this.invariants) {
      let result: InvariantCheck;
      try {
        result = { invariant: inv.name, passed: this.evaluator.test(inv.formula, env) };
      } catch (err) {
        if (!(err instanceof EvaluationError)) throw err;
        result = { invariant: inv.name, passed: false, error: err.message };
      }
      results.push(result);
      if (!result.passed) this.handleViolation(inv, result, operation);
    }

    return results;
  }

  /** Names of the invariants that fail on `state`. */
  failing(state: StateView, operation?: string): string[] {
    return this.check(state, operation)
      .filter((r) => !r.passed)
      .map((r) => r.invariant);
  }

  // ---------------------------------------------------------------------------
  // Violations
  // ---------------------------------------------------------------------------

  getViolations(): InvariantViolation[] {
    return [...this.violations];
  }

  /** Register a handler that is called on every violation. */
  onViolation(handler: ViolationHandler): void {
    this.violationHandlers.push(handler);
  }

  clear(): void {
    this.violations = [];
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private handleViolation(inv: InvariantDecl, result: InvariantCheck, operation?: string): void {
    // Cap violation history
    if (this.violations.length >= this.maxViolations) {
      this.violations.shift();
    }

    const violation: InvariantViolation = {
      id: `violation_${nanoid(8)}`,
      invariant: inv.name,
      expression: printExpr(inv.formula),
      operation,
      error: result.error,
      timestamp: Date.now(),
    };
    this.violations.push(violation);
    this.logger.warn({ invariant: inv.name, operation, error: result.error }, 'Invariant violated');

    for (const handler of this.violationHandlers) {
      try {
        handler(violation);
      } catch (err) {
        this.logger.error({ err, invariant: inv.name }, 'Violation handler threw');
      }
    }

    this.events?.emit('invariant:violated', { invariant: inv.name, operation, error: result.error });
  }
}
