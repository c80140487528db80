/**
 * Library error classes, one per category of failure
 */

import {
  ScopeguardError,
  ErrorSeverity,
  ErrorCategory,
  createErrorContext,
  type ErrorContext,
  type ErrorMetadata,
} from './types.js';

/**
 * Constructor options shared by the library error classes
 */
export interface ScopeguardErrorOptions {
  code?: string;
  cause?: Error;
  data?: Record<string, unknown>;
  severity?: ErrorSeverity;
  context?: ErrorContext;
}

function buildMetadata(
  category: ErrorCategory,
  severity: ErrorSeverity,
  options: ScopeguardErrorOptions,
  recoveryActions: string[]
): Partial<ErrorMetadata> & { severity: ErrorSeverity; category: ErrorCategory } {
  const metadata: Partial<ErrorMetadata> & {
    severity: ErrorSeverity;
    category: ErrorCategory;
  } = {
    severity,
    category,
    context: options.context ?? createErrorContext(),
    recoveryActions,
  };

  if (options.cause !== undefined) {
    metadata.cause = options.cause;
  }
  if (options.data !== undefined) {
    metadata.data = options.data;
  }

  return metadata;
}

/**
 * Misuse of the scope protocol: rethrow outside a handler, raising a sentinel,
 * touching a closed context, asynchronous bodies and the like.
 */
export class ProtocolError extends ScopeguardError {
  constructor(message: string, options: ScopeguardErrorOptions = {}) {
    const { code = 'PROTOCOL_VIOLATION', severity = ErrorSeverity.HIGH } = options;

    super(
      message,
      code,
      buildMetadata(ErrorCategory.PROTOCOL, severity, options, [
        'Raise only from inside an open context',
        'Call rethrow() from a handler',
        'Keep scope bodies synchronous',
      ])
    );
  }
}

/**
 * Taxonomy errors (duplicate kind names, unknown kinds, invalid catalogue data)
 */
export class TaxonomyError extends ScopeguardError {
  constructor(message: string, options: ScopeguardErrorOptions = {}) {
    const { code = 'TAXONOMY_ERROR', severity = ErrorSeverity.MEDIUM } = options;

    super(
      message,
      code,
      buildMetadata(ErrorCategory.TAXONOMY, severity, options, [
        'Check the kind name for typos',
        'Define application kinds once per taxonomy',
        'Validate the catalogue data file',
      ])
    );
  }
}

/**
 * Configuration errors (invalid config, missing fields, validation failures, etc.)
 */
export class ConfigurationError extends ScopeguardError {
  constructor(message: string, options: ScopeguardErrorOptions = {}) {
    const { code = 'CONFIGURATION_ERROR', severity = ErrorSeverity.CRITICAL } = options;

    super(
      message,
      code,
      buildMetadata(ErrorCategory.CONFIGURATION, severity, options, [
        'Check configuration file syntax',
        'Verify required fields are present',
        'Validate configuration values',
      ])
    );
  }
}
