/**
 * Error handling utilities and helper functions
 */

import { ScopeguardError } from './types.js';

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: E };

/**
 * Create a successful result
 */
export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Create a failed result
 */
export function failure<E = Error>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Wrap a sync operation to return a Result instead of throwing
 */
export function safe<T>(operation: () => T): Result<T, Error> {
  try {
    return success(operation());
  } catch (error) {
    return failure(error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof ScopeguardError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}
