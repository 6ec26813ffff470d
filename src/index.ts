/**
 * bagcheck — specification & verification core for bag-of-records schemas
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { SchemaEngine, storyVotesSchema } from 'bagcheck';
 *
 * const engine = new SchemaEngine();
 * const report = engine.loadSchema(storyVotesSchema());
 * const store = engine.initState();
 * const result = await engine.applyOperation(store, 'insertStory', [story]);
 * ```
 */

// Core
export { SchemaEngine, type EngineOptions } from './core/engine.js';
export { EventBus } from './core/events.js';
export { ConfigManager, PROJECT_CONFIG_FILE } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export { AsyncMutex } from './core/mutex.js';
export { ok, err, type Result } from './core/result.js';
export {
  BagcheckError,
  ConfigError,
  TypeMismatchError,
  HandleConflictError,
  SeedInvariantError,
  SchemaError,
  EvaluationError,
  ParameterError,
  PreconditionViolation,
  InvariantViolatedAtRuntime,
  DisprovenOperationError,
  UnsupportedFragmentError,
  type ErrorStage,
  type ExecutionError,
  type QueryError,
} from './core/errors.js';
export {
  BagcheckConfigSchema,
  type BagcheckConfig,
  type BagcheckConfigInput,
  type BagcheckEvents,
  type OperationOutcome,
  type RuntimeCheckMode,
} from './core/types.js';

// Model
export * from './model/types.js';
export {
  intValue,
  boolValue,
  stringValue,
  recordValue,
  handleValue,
  bagValue,
  valueEquals,
  valueKey,
  compareValues,
  conform,
  getField,
  formatValue,
} from './model/values.js';
export { Bag } from './model/bag.js';
export { HandleRegistry } from './model/handles.js';
export { typecheckSchema } from './model/typecheck.js';
export { bindParams, type Arguments } from './model/params.js';
export type {
  Schema,
  ParamDecl,
  InvariantDecl,
  OperationDecl,
  QueryDecl,
  OrderDirection,
} from './model/schema.js';

// Expression language
export * as build from './lang/builders.js';
export { printExpr } from './lang/printer.js';
export type { Expr, Effect, Qualifier, Quantifier, BinaryOp, UnaryOp } from './lang/ast.js';

// Evaluation & queries
export { Evaluator } from './eval/evaluator.js';
export { Environment, mapStateView, type StateView } from './eval/environment.js';
export { QueryEngine, materialize, type ResultRow, type ResultValue } from './query/query-engine.js';

// Store
export { StateStore, snapshotsEqual, type StateSnapshot } from './store/state.js';
export { OperationExecutor, type ExecutorOptions } from './store/executor.js';
export { applyEffects } from './store/effects.js';

// Verification
export * from './verification/index.js';

// Example program
export { storyVotesSchema, type StoryVotesOptions, type OrphanVotePolicy } from './schemas/story-votes.js';
