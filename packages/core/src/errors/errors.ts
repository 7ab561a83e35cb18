/**
 * Error types for tasktally core.
 * Every error carries a stable `code` so callers (CLI, UI) can branch on it
 * without depending on class identity across package boundaries.
 */

import type { ValueKind } from '../units/units.types';

/**
 * Base class for all tasktally-specific errors.
 */
export class TallyError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Text does not match the grammar of its declared value kind.
 */
export class ParsingError extends TallyError {
  constructor(
    message: string,
    public readonly valueKind: ValueKind,
    public readonly text: string,
    public readonly fragment?: string
  ) {
    super(message, 'PARSING_ERROR');
  }
}

/**
 * A project definition (or the tracker configuration) is structurally invalid.
 */
export class ConfigError extends TallyError {
  constructor(
    message: string,
    public readonly source?: string,
    code: string = 'CONFIG_ERROR'
  ) {
    super(message, code);
  }
}

/**
 * Field-level schema failure reported by AJV.
 */
export class DetailedValidationError extends ConfigError {
  constructor(
    documentType: string,
    public readonly errors: Array<{
      field: string;
      message: string;
      value: unknown;
    }>,
    source?: string
  ) {
    const errorSummary = errors
      .map(err => `${err.field}: ${err.message}`)
      .join(', ');

    super(
      `${documentType} validation failed: ${errorSummary}`,
      source,
      'DETAILED_VALIDATION_ERROR'
    );
  }
}

/**
 * Raised by the `abort` import strategy when incoming projects collide with
 * stored ones.
 */
export class ProjectConflictError extends TallyError {
  constructor(public readonly conflicts: string[]) {
    super(
      `Projects already exist: ${conflicts.join(', ')}`,
      'PROJECT_CONFLICT'
    );
  }
}

/**
 * A write violates a model invariant.
 */
export class ModelError extends TallyError {
  constructor(message: string, code: string = 'MODEL_ERROR') {
    super(message, code);
  }
}

/**
 * Misuse of a transaction scope, or a failure while committing one.
 */
export class TransactionError extends ModelError {
  constructor(message: string, public readonly reason?: unknown) {
    super(message, 'TRANSACTION_ERROR');
  }
}
