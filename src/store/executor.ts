/**
 * OperationExecutor — transactional application of operations.
 *
 * Per call, under the store's write lock:
 *   parameters → disproven gate → precondition → effects on a working copy
 *   → runtime invariant check (where the verifier left doubt) → commit.
 *
 * Any failure before the commit leaves the store untouched; expected
 * failures come back as `Result` errors, never as exceptions.
 */

import {
  DisprovenOperationError,
  EvaluationError,
  InvariantViolatedAtRuntime,
  ParameterError,
  PreconditionViolation,
} from '../core/errors.js';
import type { ExecutionError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { err, ok } from '../core/result.js';
import type { Result } from '../core/result.js';
import type { OperationOutcome, RuntimeCheckMode } from '../core/types.js';
import { Environment, mapStateView } from '../eval/environment.js';
import { Evaluator } from '../eval/evaluator.js';
import { bindParams } from '../model/params.js';
import type { Arguments } from '../model/params.js';
import type { OperationDecl, Schema } from '../model/schema.js';
import { InvariantMonitor } from '../verification/invariant-monitor.js';
import type { OperationSummary, VerificationReport } from '../verification/types.js';
import { applyEffects } from './effects.js';
import type { StateStore } from './state.js';

export interface ExecutorOptions {
  runtimeCheck: RuntimeCheckMode;
  blockDisproven: boolean;
}

const DEFAULT_OPTIONS: ExecutorOptions = {
  runtimeCheck: 'inconclusive',
  blockDisproven: true,
};

export class OperationExecutor {
  private readonly options: ExecutorOptions;
  private readonly evaluator: Evaluator;
  private readonly monitor: InvariantMonitor;
  private readonly events: EventBus | undefined;
  private logger = getLogger();

  constructor(
    private readonly schema: Schema,
    private readonly report: VerificationReport,
    options?: Partial<ExecutorOptions> & { monitor?: InvariantMonitor; events?: EventBus },
  ) {
    this.options = {
      runtimeCheck: options?.runtimeCheck ?? DEFAULT_OPTIONS.runtimeCheck,
      blockDisproven: options?.blockDisproven ?? DEFAULT_OPTIONS.blockDisproven,
    };
    this.events = options?.events;
    this.evaluator = new Evaluator();
    this.monitor = options?.monitor ?? new InvariantMonitor(schema.invariants, { events: this.events });
  }

  /** Apply operation `name` to `store`; serialized with other writers. */
  async apply(store: StateStore, name: string, args: Arguments): Promise<Result<OperationOutcome, ExecutionError>> {
    return store.writeLock.withLock(() => this.applyLocked(store, name, args));
  }

  /** Whether committing `op` re-checks the invariants first. */
  needsRuntimeCheck(op: string): boolean {
    const summary = this.summary(op);
    switch (this.options.runtimeCheck) {
      case 'always':
        return true;
      case 'never':
        return false;
      case 'inconclusive':
        return !summary || summary.inconclusive.length > 0 || summary.disproven.length > 0;
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private applyLocked(store: StateStore, name: string, args: Arguments): Result<OperationOutcome, ExecutionError> {
    const start = performance.now();
    try {
      const op = this.lookup(name);
      const params = bindParams(op.name, op.params, args, this.schema, store.handles());

      const disproven = this.summary(op.name)?.disproven ?? [];
      if (this.options.blockDisproven && disproven.length > 0) {
        return this.reject(op.name, new DisprovenOperationError(op.name, disproven));
      }

      const snapshot = store.current();
      const env = Environment.of(mapStateView(snapshot), params);
      if (!this.evaluator.test(op.assume, env)) {
        return this.reject(op.name, new PreconditionViolation(op.name));
      }

      const working = applyEffects(op.effects, snapshot, params, this.evaluator);

      const checked = this.needsRuntimeCheck(op.name);
      if (checked) {
        const failing = this.monitor.failing(mapStateView(working), op.name);
        if (failing.length > 0) {
          this.logger.warn({ operation: op.name, invariants: failing }, 'Operation rolled back');
          this.events?.emit('operation:rolled-back', { operation: op.name, invariants: failing });
          return err(new InvariantViolatedAtRuntime(op.name, failing));
        }
      }

      store.commit(working);
      const duration = performance.now() - start;
      this.logger.info({ operation: op.name, version: store.version, checked }, 'Operation committed');
      this.events?.emit('operation:committed', { operation: op.name, version: store.version, duration });
      return ok({ operation: op.name, version: store.version, checkedAtRuntime: checked });
    } catch (error) {
      if (error instanceof ParameterError || error instanceof EvaluationError) return this.reject(name, error);
      throw error;
    }
  }

  private lookup(name: string): OperationDecl {
    const op = this.schema.operations.find((o) => o.name === name);
    if (!op) throw new ParameterError(`unknown operation "${name}"`, name);
    return op;
  }

  private summary(op: string): OperationSummary | undefined {
    return this.report.operations[op];
  }

  private reject(operation: string, error: ExecutionError): Result<OperationOutcome, ExecutionError> {
    this.logger.info({ operation, code: error.code, message: error.message }, 'Operation rejected');
    this.events?.emit('operation:rejected', { operation, code: error.code, message: error.message });
    return err(error);
  }
}
