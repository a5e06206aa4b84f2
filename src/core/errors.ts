/**
 * @fileoverview skewcycle error hierarchy
 *
 * Typed, structured errors for the search pipeline. Numerical failures are
 * recoverable by the caller; graph and configuration failures are fatal.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class SkewCycleError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// NUMERICAL ERRORS
// ============================================================================

export type NumericalOperation = 'regression' | 'normalization' | 'welch';

/**
 * A regression design that cannot be solved: collinear regressors, or more
 * regressors than usable rows. Callers treat the affected subset as
 * inconclusive.
 */
export class NumericalError extends SkewCycleError {
  readonly code = 'NUMERICAL_ERROR';
  readonly retryable = false;

  constructor(
    readonly operation: NumericalOperation,
    message: string,
    readonly rows?: number,
    readonly regressors?: number,
  ) {
    super(`Numerical ${operation} failed: ${message}`);
    this.name = 'NumericalError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        rows: this.rows,
        regressors: this.regressors,
      },
    };
  }
}

// ============================================================================
// GRAPH ERRORS
// ============================================================================

export class InvalidGraphError extends SkewCycleError {
  readonly code = 'INVALID_GRAPH_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly missingNodes: readonly string[] = [],
  ) {
    super(`Invalid graph: ${message}`);
    this.name = 'InvalidGraphError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        missingNodes: this.missingNodes,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends SkewCycleError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends SkewCycleError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
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
// ERROR TYPE GUARD
// ============================================================================

export function isNumericalError(error: unknown): error is NumericalError {
  return error instanceof NumericalError;
}
