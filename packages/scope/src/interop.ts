/**
 * Bridges between kinds and native exceptions, for callers that expect
 * `throw`/`catch`
 */

import {
  ErrorCategory,
  ErrorSeverity,
  ScopeguardError,
  createErrorContext,
} from '@scopeguard/errors';
import { formatKind, type FaultKind } from '@scopeguard/kinds';

import type { Outcome } from './outcome.js';

/**
 * A fault kind carried by a native exception. `ctx.check` turns it back into
 * a raise of the same kind.
 */
export class KindError extends ScopeguardError {
  readonly kind: FaultKind;

  constructor(kind: FaultKind, operation?: string) {
    super(`${formatKind(kind)}: ${kind.description}`, kind.code ?? 'KIND_RAISED', {
      severity: ErrorSeverity.MEDIUM,
      category: ErrorCategory.KIND,
      context: createErrorContext(operation === undefined ? {} : { operation }),
      data: { kind: kind.name, value: kind.value, category: kind.category },
    });
    this.kind = kind;
  }
}

export function toError(kind: FaultKind, operation?: string): KindError {
  return new KindError(kind, operation);
}

/**
 * Data of a successful outcome; a failed one throws its kind as a `KindError`
 */
export function unwrap<T>(outcome: Outcome<T>, operation?: string): T {
  if (!outcome.success) {
    throw toError(outcome.error, operation);
  }
  return outcome.data;
}
