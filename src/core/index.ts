/**
 * @fileoverview Core skewcycle infrastructure
 *
 * Result types and the error hierarchy shared by every stage of the search.
 */

// Result types and helpers
export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  safeAsync,
  safeSync,
  safeReadFile,
} from './result.js';

// Error types
export {
  type ErrorJSON,
  type NumericalOperation,
  SkewCycleError,
  NumericalError,
  InvalidGraphError,
  ValidationError,
  ConfigurationError,
  isNumericalError,
} from './errors.js';
