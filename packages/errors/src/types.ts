/**
 * Error types and base classes shared by scopeguard packages
 */

/**
 * Error severity levels for classification and logging
 */
export enum ErrorSeverity {
  /** Low severity - informational, the operation carried on */
  LOW = 'low',
  /** Medium severity - the requested operation could not complete */
  MEDIUM = 'medium',
  /** High severity - the caller broke a contract of the library */
  HIGH = 'high',
  /** Critical severity - the library cannot be used in this state */
  CRITICAL = 'critical',
}

/**
 * Error categories for the library's own failures
 */
export enum ErrorCategory {
  /** Misuse of the scope protocol (rethrow outside a handler, closed context, etc.) */
  PROTOCOL = 'protocol',
  /** Kind taxonomy problems (duplicate names, unknown kinds, bad catalogue data) */
  TAXONOMY = 'taxonomy',
  /** Configuration errors (invalid file, missing fields, validation failures, etc.) */
  CONFIGURATION = 'configuration',
  /** A fault kind surfaced as a native exception */
  KIND = 'kind',
  /** Unknown or uncategorized errors */
  UNKNOWN = 'unknown',
}

/**
 * Where an error was raised, for debugging
 */
export interface ErrorContext {
  /** Operation name or identifier */
  operation?: string;
  /** Component or module where the error occurred */
  component?: string;
  /** Additional metadata for debugging */
  metadata?: Record<string, unknown>;
  /** Timestamp when the error occurred */
  timestamp: Date;
}

/**
 * Error metadata carried by every library error
 */
export interface ErrorMetadata {
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: ErrorContext;
  /** Original error that caused this error (error chaining) */
  cause?: Error;
  /** Additional error-specific data */
  data?: Record<string, unknown>;
  /** Suggested recovery actions */
  recoveryActions?: string[];
}

/**
 * Build an error context stamped with the current time
 */
export function createErrorContext(
  options: {
    operation?: string;
    component?: string;
    metadata?: Record<string, unknown>;
  } = {}
): ErrorContext {
  const context: ErrorContext = { timestamp: new Date() };

  if (options.operation !== undefined) {
    context.operation = options.operation;
  }
  if (options.component !== undefined) {
    context.component = options.component;
  }
  if (options.metadata !== undefined) {
    context.metadata = options.metadata;
  }

  return context;
}

/**
 * Base error class with metadata and context tracking
 */
export abstract class ScopeguardError extends Error {
  public readonly code: string;
  public readonly metadata: ErrorMetadata;

  constructor(
    message: string,
    code: string,
    metadata: Partial<ErrorMetadata> & {
      severity: ErrorSeverity;
      category: ErrorCategory;
    }
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;

    this.metadata = {
      context: createErrorContext(),
      ...metadata,
    };

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.metadata.severity,
      category: this.metadata.category,
      operation: this.metadata.context.operation,
      component: this.metadata.context.component,
      timestamp: this.metadata.context.timestamp,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(this.metadata.cause && { cause: this.metadata.cause.message }),
    };
  }
}
