/**
 * Error handling module - library errors for scopeguard packages
 *
 * Features:
 * - Error classes with severity/category metadata
 * - Result types for safe error handling
 * - Structured error information for logging
 */

// Core error types and enums
export {
  ErrorSeverity,
  ErrorCategory,
  ScopeguardError,
  createErrorContext,
  type ErrorContext,
  type ErrorMetadata,
} from './types.js';

// Error classes
export {
  ProtocolError,
  TaxonomyError,
  ConfigurationError,
  type ScopeguardErrorOptions,
} from './domain-errors.js';

// Error utilities and helpers
export { type Result, success, failure, safe, extractErrorInfo } from './utils.js';
