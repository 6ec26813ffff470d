/**
 * SchemaEngine — the core's façade
 *
 * loadSchema → (typecheck, verify every operation/invariant pair once)
 * initState  → StateStore handle, empty or seeded
 * runQuery / applyOperation against an explicitly passed store.
 *
 * Expected failures of queries and operations come back as `Result` values.
 * Load-time problems (ill-formed schema, bad configuration) throw.
 */

import type { BagcheckConfig, BagcheckConfigInput, OperationOutcome } from './types.js';
import { ConfigManager } from './config.js';
import { BagcheckError, EvaluationError, ParameterError, SeedInvariantError } from './errors.js';
import type { ExecutionError, QueryError } from './errors.js';
import { EventBus } from './events.js';
import { createLogger, getLogger, setLogger } from './logger.js';
import { err, ok } from './result.js';
import type { Result } from './result.js';

import { mapStateView } from '../eval/environment.js';
import { Evaluator } from '../eval/evaluator.js';
import type { Arguments } from '../model/params.js';
import type { Schema } from '../model/schema.js';
import { typecheckSchema } from '../model/typecheck.js';
import type { Value } from '../model/types.js';
import { QueryEngine } from '../query/query-engine.js';
import type { ResultRow } from '../query/query-engine.js';
import { OperationExecutor } from '../store/executor.js';
import { StateStore } from '../store/state.js';
import { InvariantMonitor } from '../verification/invariant-monitor.js';
import type { InvariantCheck } from '../verification/invariant-monitor.js';
import { InvariantVerifier } from '../verification/invariant-verifier.js';
import type { VerificationReport } from '../verification/types.js';

export interface EngineOptions {
  /** Overrides applied on top of `.bagcheck.yaml` and the environment. */
  config?: BagcheckConfigInput;
  projectDir?: string;
  env?: NodeJS.ProcessEnv;
}

interface LoadedSchema {
  schema: Schema;
  report: VerificationReport;
  queries: QueryEngine;
  executor: OperationExecutor;
  monitor: InvariantMonitor;
}

export class SchemaEngine {
  readonly events = new EventBus();
  private readonly config: BagcheckConfig;
  private readonly evaluator = new Evaluator();
  private loaded: LoadedSchema | null = null;
  private logger;

  constructor(options: EngineOptions = {}) {
    this.config = new ConfigManager(options.projectDir, options.env).load(options.config);
    setLogger(createLogger('bagcheck', this.config.logging));
    this.logger = getLogger();
  }

  getConfig(): BagcheckConfig {
    return this.config;
  }

  // ---------------------------------------------------------------------------
  // Loading
  // ---------------------------------------------------------------------------

  /**
   * Type-check `schema` and decide every (operation, invariant) pair. The
   * schema replaces any previously loaded one.
   */
  loadSchema(schema: Schema): VerificationReport {
    typecheckSchema(schema);

    const report = new InvariantVerifier(schema, this.config.verifier, this.events).verify();
    const monitor = new InvariantMonitor(schema.invariants, { events: this.events, evaluator: this.evaluator });
    this.loaded = {
      schema,
      report,
      queries: new QueryEngine(schema, this.evaluator),
      executor: new OperationExecutor(schema, report, {
        ...this.config.executor,
        monitor,
        events: this.events,
      }),
      monitor,
    };

    this.logger.info(
      { schema: schema.name, operations: schema.operations.length, invariants: schema.invariants.length },
      'Schema loaded',
    );
    this.events.emit('verify:schema:loaded', { schema: schema.name, report });
    return report;
  }

  get report(): VerificationReport | null {
    return this.loaded?.report ?? null;
  }

  get schema(): Schema | null {
    return this.loaded?.schema ?? null;
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  /**
   * A fresh store; `seed` falls back to the schema's own seed. A seed that
   * breaks any invariant is refused with SeedInvariantError, since every
   * verdict assumes the invariants hold before an operation runs.
   */
  initState(seed?: Record<string, Value[]>): StateStore {
    const { schema, monitor } = this.requireSchema();
    const store = StateStore.create(schema, seed);
    const failing = monitor.failing(mapStateView(store.current()));
    if (failing.length > 0) {
      this.logger.error({ schema: schema.name, invariants: failing }, 'Seed rejected');
      throw new SeedInvariantError(failing);
    }
    return store;
  }

  /** Evaluate every invariant against the store's current snapshot. */
  auditState(state: StateStore): InvariantCheck[] {
    const { monitor } = this.requireStore(state);
    return monitor.check(mapStateView(state.current()));
  }

  // ---------------------------------------------------------------------------
  // Queries & operations
  // ---------------------------------------------------------------------------

  /**
   * Run a declared query against the store's current snapshot. Never waits
   * for the writer lock.
   */
  async runQuery(state: StateStore, name: string, args: Arguments): Promise<Result<ResultRow[], QueryError>> {
    const { queries } = this.requireStore(state);
    const start = performance.now();
    try {
      const rows = queries.run(name, args, mapStateView(state.current()), state.handles());
      const duration = performance.now() - start;
      this.logger.debug({ query: name, rows: rows.length }, 'Query executed');
      this.events.emit('query:executed', { query: name, rows: rows.length, duration });
      return ok(rows);
    } catch (error) {
      if (error instanceof ParameterError || error instanceof EvaluationError) {
        this.logger.info({ query: name, code: error.code, message: error.message }, 'Query failed');
        return err(error);
      }
      throw error;
    }
  }

  async applyOperation(
    state: StateStore,
    name: string,
    args: Arguments,
  ): Promise<Result<OperationOutcome, ExecutionError>> {
    const { executor } = this.requireStore(state);
    return executor.apply(state, name, args);
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private requireSchema(): LoadedSchema {
    if (!this.loaded) throw new BagcheckError('No schema loaded', 'SCHEMA_NOT_LOADED', 'load');
    return this.loaded;
  }

  private requireStore(state: StateStore): LoadedSchema {
    const loaded = this.requireSchema();
    if (state.schemaName !== loaded.schema.name) {
      throw new BagcheckError(
        `State belongs to schema "${state.schemaName}", not "${loaded.schema.name}"`,
        'SCHEMA_MISMATCH',
        'execute',
      );
    }
    return loaded;
  }
}
