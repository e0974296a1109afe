export type OrmErrorKind = 'InvalidModel' | 'InvalidQuery' | 'TypeMismatch' | 'Decode' | 'Engine';

/**
 * Base class of every error the library throws. Switch on `kind` to handle
 * each failure without a chain of instanceof checks.
 */
export abstract class OrmError extends Error {
  abstract readonly kind: OrmErrorKind;

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Empty or malformed field list, table name or primary key. */
export class InvalidModelError extends OrmError {
  override readonly name = 'InvalidModelError';
  readonly kind = 'InvalidModel';
}

/** Negative limit, unknown column, or a builder that was already consumed. */
export class InvalidQueryError extends OrmError {
  override readonly name = 'InvalidQueryError';
  readonly kind = 'InvalidQuery';
}

export class TypeMismatchError extends OrmError {
  override readonly name = 'TypeMismatchError';
  readonly kind = 'TypeMismatch';

  constructor(
    readonly expected: string,
    readonly actual: string,
    message?: string,
  ) {
    super(message ?? `Type mismatch: cannot read ${actual} value as ${expected}`);
  }
}

/** A fetched row could not be turned back into a record. */
export class DecodeError extends OrmError {
  override readonly name = 'DecodeError';
  readonly kind = 'Decode';
}

export class EngineError extends OrmError {
  override readonly name = 'EngineError';
  readonly kind = 'Engine';

  /** Engine-specific error code (e.g. `SQLITE_CONSTRAINT_PRIMARYKEY`), when the engine reports one. */
  readonly code: string | undefined;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.code = codeOf(cause);
  }
}

function codeOf(cause: unknown): string | undefined {
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}
