export type ErrorStage = 'config' | 'load' | 'verify' | 'evaluate' | 'query' | 'execute';

export class BagcheckError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: ErrorStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'BagcheckError';
  }
}

export class ConfigError extends BagcheckError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

/**
 * A value does not match its declared type. Raised for loader/front-end bugs;
 * the core does not recover from it.
 */
export class TypeMismatchError extends BagcheckError {
  constructor(message: string, public readonly expected: string, public readonly actual: string) {
    super(message, 'TYPE_MISMATCH', 'load');
    this.name = 'TypeMismatchError';
  }
}

/** Two handles share an identity but carry different records. */
export class HandleConflictError extends BagcheckError {
  constructor(public readonly handleId: string, public readonly path: string) {
    super(`${path}: handle ${handleId} is already bound to a different record`, 'HANDLE_CONFLICT', 'load');
    this.name = 'HandleConflictError';
  }
}

/** The initial state breaks declared invariants. */
export class SeedInvariantError extends BagcheckError {
  constructor(public readonly invariants: string[]) {
    super(`Initial state breaks ${invariants.join(', ')}`, 'SEED_INVARIANT_VIOLATION', 'load');
    this.name = 'SeedInvariantError';
  }
}

export class SchemaError extends BagcheckError {
  constructor(message: string, public readonly declaration: string, cause?: Error) {
    super(`${declaration}: ${message}`, 'SCHEMA_ERROR', 'load', cause);
    this.name = 'SchemaError';
  }
}

export class EvaluationError extends BagcheckError {
  constructor(message: string, cause?: Error) {
    super(message, 'EVALUATION_ERROR', 'evaluate', cause);
    this.name = 'EvaluationError';
  }
}

export class ParameterError extends BagcheckError {
  constructor(message: string, public readonly target: string) {
    super(message, 'PARAMETER_ERROR', 'execute');
    this.name = 'ParameterError';
  }
}

export class PreconditionViolation extends BagcheckError {
  constructor(public readonly operation: string) {
    super(`Precondition of operation "${operation}" does not hold`, 'PRECONDITION_VIOLATION', 'execute');
    this.name = 'PreconditionViolation';
  }
}

export class InvariantViolatedAtRuntime extends BagcheckError {
  constructor(public readonly operation: string, public readonly invariants: string[]) {
    super(
      `Operation "${operation}" broke ${invariants.join(', ')}; state rolled back`,
      'INVARIANT_VIOLATED_AT_RUNTIME',
      'execute',
    );
    this.name = 'InvariantViolatedAtRuntime';
  }
}

export class DisprovenOperationError extends BagcheckError {
  constructor(public readonly operation: string, public readonly invariants: string[]) {
    super(
      `Operation "${operation}" is disproven against ${invariants.join(', ')} and is blocked`,
      'OPERATION_DISPROVEN',
      'execute',
    );
    this.name = 'DisprovenOperationError';
  }
}

export type ExecutionError =
  | ParameterError
  | PreconditionViolation
  | InvariantViolatedAtRuntime
  | DisprovenOperationError
  | EvaluationError;

export type QueryError = ParameterError | EvaluationError;

/** A formula falls outside the fragment the verifier decides. */
export class UnsupportedFragmentError extends BagcheckError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_FRAGMENT', 'verify');
    this.name = 'UnsupportedFragmentError';
  }
}
