import { NoError, type FaultKind, type NoErrorKind } from '@scopeguard/kinds';

/**
 * Result of a `guarded` call: the function's value, or the fault that
 * escaped it. Shaped like `Result` from `@scopeguard/errors` with the final
 * kind alongside.
 */
export type Outcome<T> =
  | { success: true; data: T; kind: NoErrorKind; error?: never }
  | { success: false; data?: never; kind: FaultKind; error: FaultKind };

export function succeeded<T>(data: T): Outcome<T> {
  return { success: true, data, kind: NoError };
}

export function failed<T = never>(kind: FaultKind): Outcome<T> {
  return { success: false, kind, error: kind };
}

