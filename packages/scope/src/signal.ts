import type { EarlyReturnKind, FaultKind } from '@scopeguard/kinds';

/**
 * The non-local exit carrying a raised kind from the raise site to the
 * nearest frame of the context that raised it. Only that context's frames and
 * boundary consume it; everything else lets it pass.
 */
export class RaiseSignal {
  constructor(
    readonly owner: object,
    readonly kind: FaultKind | EarlyReturnKind
  ) {}
}

export function isOwnSignal(value: unknown, owner: object): value is RaiseSignal {
  return value instanceof RaiseSignal && value.owner === owner;
}

export function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Attach a rejection handler to a promise the caller is about to abandon, so
 * that a late failure is reported instead of surfacing as an unhandled
 * rejection
 */
export function abandon(thenable: PromiseLike<unknown>, onRejected: (error: unknown) => void): void {
  void Promise.resolve(thenable).then(undefined, onRejected);
}
