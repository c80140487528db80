/**
 * Function error context: the per-call state behind `throws`/`guarded`, and
 * the controller that bodies use to raise, bind and open nested scopes
 */

import { randomUUID } from 'crypto';

import { ProtocolError } from '@scopeguard/errors';
import {
  EarlyReturn,
  EnsureViolated,
  NoError,
  NullRef,
  Unrecoverable,
  defaultTaxonomy,
  formatKind,
  isFault,
  type EarlyReturnKind,
  type FaultKind,
  type Kind,
  type Taxonomy,
} from '@scopeguard/kinds';
import type { Logger } from '@scopeguard/logging';

import { FrameBuilder, type FrameHost, type FrameState, type ScopeFrame } from './frame.js';
import { KindError } from './interop.js';
import type { ProtocolOptions } from './options.js';
import { RaiseSignal, isOwnSignal } from './signal.js';
import type { Outcome } from './outcome.js';

/**
 * Per-call error context. `R` is the result type of the protected function
 * (`void` for `throws`).
 */
export class FunctionErrorContext<R = void> {
  readonly id: string = randomUUID();
  readonly name: string;
  readonly declared: readonly FaultKind[];

  private readonly frames: ScopeFrame[] = [];
  private readonly taxonomy: Taxonomy;
  private readonly logger: Logger | undefined;
  private readonly tracing: boolean;
  private readonly host: FrameHost;
  private returned: { value: R } | undefined;
  private closed = false;

  constructor(declared: readonly FaultKind[], options: ProtocolOptions = {}) {
    this.declared = [...declared];
    this.name = options.name ?? 'anonymous';
    this.taxonomy = options.taxonomy ?? defaultTaxonomy;
    this.logger = options.logger?.child(this.name, { contextId: this.id });
    this.tracing = options.trace ?? false;
    this.host = this.createHost();
  }

  /**
   * Kind of the innermost open frame; `NoError` outside any frame
   */
  get kind(): Kind {
    return this.frames[this.frames.length - 1]?.kind ?? NoError;
  }

  /**
   * Number of open frames
   */
  get depth(): number {
    return this.frames.length;
  }

  /**
   * The innermost open frame, if any
   */
  get frame(): FrameState | undefined {
    return this.frames[this.frames.length - 1];
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Open a protected block. The acquire step runs first; whatever it raises
   * becomes the frame's kind and skips the primary body.
   */
  try(): FrameBuilder<undefined>;
  try<T>(acquire: () => T): FrameBuilder<T>;
  try<T>(acquire?: () => T): FrameBuilder<T | undefined> {
    this.assertOpen('try');
    return new FrameBuilder<T | undefined>(this.host, acquire ?? (() => undefined));
  }

  /**
   * Raise a fault. Inside an acquire step or primary body it goes to that
   * frame's handlers; from a handler or finalizer it goes outward.
   */
  throw(kind: FaultKind): never {
    this.assertOpen('throw');
    const candidate: Kind = kind;
    if (!isFault(candidate)) {
      throw new ProtocolError(`Only faults can be raised, not ${formatKind(candidate)}`, {
        code: 'SENTINEL_RAISED',
      });
    }
    throw new RaiseSignal(this, kind);
  }

  /**
   * Re-raise the kind being handled, unchanged, to the enclosing scope
   */
  rethrow(): never {
    this.assertOpen('rethrow');
    const handling = [...this.frames].reverse().find(f => f.phase === 'handling');
    if (!handling || !isFault(handling.kind)) {
      throw new ProtocolError('rethrow() is only valid inside a handler', {
        code: 'RETHROW_OUTSIDE_HANDLER',
        data: { depth: this.depth },
      });
    }
    throw new RaiseSignal(this, handling.kind);
  }

  /**
   * Leave the protected function early. Every open finalizer runs; callers
   * see `NoError` (and, for `guarded`, this value).
   */
  return(value: R): never {
    this.assertOpen('return');
    this.returned = { value };
    throw new RaiseSignal(this, EarlyReturn);
  }

  /**
   * `LET`: raise `NullRef` on `null`/`undefined`, otherwise hand the value back
   */
  bind<T>(value: T): NonNullable<T> {
    return this.maybe(value, NullRef);
  }

  /**
   * `MAYBE`: raise `kind` on `null`/`undefined`, otherwise hand the value back
   */
  maybe<T>(value: T, kind: FaultKind): NonNullable<T> {
    if (value === null || value === undefined) {
      return this.throw(kind);
    }
    return value;
  }

  /**
   * `ENSURE`: raise `EnsureViolated` when the condition is falsy
   */
  ensure(condition: unknown): void {
    if (!condition) {
      this.throw(EnsureViolated);
    }
  }

  /**
   * `CHECK`: run a side-effecting operation and classify a thrown platform
   * error (`code`/`errno`) into a kind. Codes the taxonomy does not know raise
   * `Unrecoverable`; a `KindError` raises the kind it carries. Other exceptions
   * are not raises and keep propagating.
   */
  check<T>(operation: () => T): T {
    this.assertOpen('check');
    try {
      return operation();
    } catch (error) {
      if (error instanceof RaiseSignal) {
        throw error;
      }
      if (error instanceof KindError) {
        this.throw(error.kind);
      }

      const kind = this.taxonomy.classify(error);
      if (kind) {
        this.throw(kind);
      }
      if (isPlatformError(error)) {
        this.throw(Unrecoverable);
      }
      throw error;
    }
  }

  /**
   * Feed a kind or outcome returned by another protected function into this
   * one: faults are raised here, success hands back the data
   */
  inherit(kind: Kind): void;
  inherit<T>(outcome: Outcome<T>): T;
  inherit<T>(input: Kind | Outcome<T>): T | void {
    this.assertOpen('inherit');
    if ('tag' in input) {
      if (input.tag === 'early_return') {
        throw new ProtocolError('EarlyReturn never crosses a function boundary', {
          code: 'SENTINEL_INHERITED',
        });
      }
      if (isFault(input)) {
        this.throw(input);
      }
      return;
    }

    if (!input.success) {
      return this.throw(input.error);
    }
    return input.data;
  }

  /**
   * Value handed to `return`, if any
   */
  returnedValue(): { value: R } | undefined {
    return this.returned;
  }

  /**
   * Consume a raise that reached the boundary; anything else escapes
   */
  absorb(error: unknown): FaultKind | EarlyReturnKind {
    if (!isOwnSignal(error, this)) {
      throw error;
    }
    return error.kind;
  }

  close(): void {
    this.closed = true;
  }

  trace(message: string, data: Record<string, unknown> = {}): void {
    if (this.tracing) {
      this.logger?.debug(message, data);
    }
  }

  warn(message: string, data: Record<string, unknown> = {}): void {
    this.logger?.warn(message, data);
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new ProtocolError(`${operation}() called on a closed context (${this.name})`, {
        code: 'CONTEXT_CLOSED',
        data: { context: this.name, operation },
      });
    }
  }

  private createHost(): FrameHost {
    return {
      owner: this,
      enter: frame => {
        this.assertOpen('try');
        this.frames.push(frame);
        return this.frames.length;
      },
      leave: frame => {
        const top = this.frames.pop();
        if (top !== frame) {
          throw new ProtocolError('Scopes must close innermost first', {
            code: 'FRAME_ORDER',
            data: { depth: this.frames.length + 1 },
          });
        }
      },
      signal: kind => new RaiseSignal(this, kind),
      trace: (message, data) => this.trace(message, data),
      warn: (message, data) => this.warn(message, data),
    };
  }
}

function isPlatformError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    (('code' in error && typeof error.code === 'string' && /^E[A-Z0-9]+$/.test(error.code)) ||
      ('errno' in error && typeof error.errno === 'number'))
  );
}
