/**
 * @fileoverview Advisor error hierarchy
 *
 * Load-time problems with the knowledge base are fatal (`SchemaError`),
 * session-time answer problems are recoverable (`InvalidAnswerError`) and
 * references to undeclared attributes are reported as diagnostics
 * (`UnknownAttributeError`) rather than thrown during evaluation.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  recoverable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class AdvisorError extends Error {
  abstract readonly code: string;
  abstract readonly recoverable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// SCHEMA ERRORS
// ============================================================================

/**
 * Malformed or incomplete knowledge base. `location` points at the offending
 * node, e.g. `rules[3].when[0].fact` or `items[Wood screw].properties.rigidity`.
 */
export class SchemaError extends AdvisorError {
  readonly code = 'SCHEMA_ERROR';
  readonly recoverable = false;

  constructor(
    readonly location: string,
    readonly reason: string,
    readonly source?: string,
  ) {
    super(source ? `${source}: ${location}: ${reason}` : `${location}: ${reason}`);
    this.name = 'SchemaError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        location: this.location,
        reason: this.reason,
        source: this.source,
      },
    };
  }
}

// ============================================================================
// ANSWER ERRORS
// ============================================================================

/**
 * An answer outside the question's declared kind or choice domain. The fact
 * store is left untouched; callers re-prompt.
 */
export class InvalidAnswerError extends AdvisorError {
  readonly code = 'INVALID_ANSWER';
  readonly recoverable = true;

  constructor(
    readonly questionId: string,
    readonly received: string,
    readonly expected: string,
  ) {
    super(`Invalid answer for ${questionId}: expected ${expected}, got ${received}`);
    this.name = 'InvalidAnswerError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        questionId: this.questionId,
        received: this.received,
        expected: this.expected,
      },
    };
  }
}

// ============================================================================
// ATTRIBUTE ERRORS
// ============================================================================

export class UnknownAttributeError extends AdvisorError {
  readonly code = 'UNKNOWN_ATTRIBUTE';
  readonly recoverable = true;

  constructor(
    readonly path: string,
    readonly location: string,
  ) {
    super(`${location}: attribute '${path}' is not declared in the knowledge base schema`);
    this.name = 'UnknownAttributeError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        path: this.path,
        location: this.location,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigError extends AdvisorError {
  readonly code = 'CONFIG_ERROR';
  readonly recoverable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isAdvisorError(error: unknown): error is AdvisorError {
  return error instanceof AdvisorError;
}

export function isRecoverable(error: unknown): boolean {
  return isAdvisorError(error) && error.recoverable;
}
