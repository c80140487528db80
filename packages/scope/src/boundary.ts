/**
 * Function boundary: opens a context per call, runs the body and turns
 * whatever reaches the outermost level into the caller-visible result
 */

import { ProtocolError, extractErrorInfo } from '@scopeguard/errors';
import {
  formatKind,
  isFault,
  kindEquals,
  type FaultKind,
  type NoErrorKind,
} from '@scopeguard/kinds';

import { FunctionErrorContext } from './context.js';
import type { ProtocolOptions } from './options.js';
import { failed, succeeded, type Outcome } from './outcome.js';
import { abandon, isThenable } from './signal.js';

export type ProtectedBody<T> = (ctx: FunctionErrorContext<T>) => T;

/**
 * Run `body` as a protected function and return its final kind. An early
 * `ctx.return()` reads as `NoError`.
 */
export function throws(
  declared: readonly FaultKind[],
  body: ProtectedBody<void>,
  options: ProtocolOptions = {}
): NoErrorKind | FaultKind {
  return execute(declared, body, options).kind;
}

/**
 * Run `body` as a protected function and return its value, or the value
 * handed to `ctx.return()`, as an outcome
 */
export function guarded<T>(
  declared: readonly FaultKind[],
  body: ProtectedBody<T>,
  options: ProtocolOptions = {}
): Outcome<T> {
  return execute(declared, body, options);
}

/**
 * Wrap `fn` so that each call runs in a fresh context of its own
 */
export function protect<A extends unknown[], T>(
  declared: readonly FaultKind[],
  fn: (ctx: FunctionErrorContext<T>, ...args: A) => T,
  options: ProtocolOptions = {}
): (...args: A) => Outcome<T> {
  const name = options.name ?? (fn.name === '' ? 'anonymous' : fn.name);
  return (...args: A) => execute(declared, ctx => fn(ctx, ...args), { ...options, name });
}

function execute<T>(
  declared: readonly FaultKind[],
  body: ProtectedBody<T>,
  options: ProtocolOptions
): Outcome<T> {
  const ctx = new FunctionErrorContext<T>(declared, options);
  ctx.trace('function entered', { declared: declared.map(formatKind) });

  let outcome: Outcome<T>;
  try {
    const result = body(ctx);
    if (isThenable(result)) {
      abandon(result, error =>
        ctx.warn('abandoned async function body rejected', { error: extractErrorInfo(error) })
      );
      throw new ProtocolError(`${ctx.name} returned a promise; protected functions are synchronous`, {
        code: 'ASYNC_SCOPE_BODY',
        data: { context: ctx.name },
      });
    }
    outcome = succeeded(result);
  } catch (error) {
    const kind = ctx.absorb(error);
    outcome = isFault(kind) ? failed(kind) : earlyReturn(ctx);
  } finally {
    ctx.close();
  }

  if (!outcome.success && options.strictDeclarations && !isDeclared(declared, outcome.error)) {
    ctx.warn('undeclared kind escaped', {
      kind: formatKind(outcome.error),
      declared: declared.map(formatKind),
    });
  }
  ctx.trace('function returned', { kind: formatKind(outcome.kind) });

  return outcome;
}

function earlyReturn<T>(ctx: FunctionErrorContext<T>): Outcome<T> {
  const returned = ctx.returnedValue();
  if (!returned) {
    throw new ProtocolError('EarlyReturn reached the boundary without a return value', {
      code: 'MISSING_RETURN_VALUE',
      data: { context: ctx.name },
    });
  }
  return succeeded(returned.value);
}

function isDeclared(declared: readonly FaultKind[], kind: FaultKind): boolean {
  return declared.some(k => kindEquals(k, kind));
}
