/**
 * Scope frames: one activation of a protected block
 *
 * entered -> success | raised -> handling -> finalizing -> closed
 */

import { ProtocolError, extractErrorInfo } from '@scopeguard/errors';
import {
  NoError,
  formatKind,
  isFault,
  isNoError,
  kindEquals,
  type EarlyReturnKind,
  type FaultKind,
  type Kind,
} from '@scopeguard/kinds';

import { abandon, isOwnSignal, isThenable } from './signal.js';

export const FRAME_PHASES = [
  'entered',
  'success',
  'raised',
  'handling',
  'finalizing',
  'closed',
] as const;
export type FramePhase = (typeof FRAME_PHASES)[number];

export type Handler = (kind: FaultKind) => void;

/**
 * A declared handler: specific kinds, or the wildcard
 */
export interface HandlerClause {
  readonly kinds: readonly FaultKind[] | 'any';
  readonly handler: Handler;
}

/**
 * `CATCH(kind)`: matched on exact kind equality; several kinds share one body
 */
export function catching(kinds: FaultKind | readonly FaultKind[], handler: Handler): HandlerClause {
  return { kinds: 'tag' in kinds ? [kinds] : [...kinds], handler };
}

/**
 * `OTHERWISE`/`CATCHANY`: matches any fault no `catching` clause matched
 */
export function otherwise(handler: Handler): HandlerClause {
  return { kinds: 'any', handler };
}

/**
 * Read-only view of a frame, as seen from inside its bodies
 */
export interface FrameState {
  readonly depth: number;
  readonly phase: FramePhase;
  readonly kind: Kind;
}

/**
 * What a frame needs from the context that owns it
 */
export interface FrameHost {
  readonly owner: object;
  enter(frame: ScopeFrame): number;
  leave(frame: ScopeFrame): void;
  signal(kind: FaultKind | EarlyReturnKind): unknown;
  trace(message: string, data: Record<string, unknown>): void;
  warn(message: string, data: Record<string, unknown>): void;
}

type Stage = 'acquire' | 'in' | 'handler' | 'finally';

/**
 * One activation of the scope machine. Built by `FrameBuilder`, run once by
 * `finally()`.
 */
export class ScopeFrame implements FrameState {
  private currentKind: Kind = NoError;
  private currentPhase: FramePhase = 'entered';
  private frameDepth = 0;

  constructor(private readonly host: FrameHost) {}

  get depth(): number {
    return this.frameDepth;
  }

  get phase(): FramePhase {
    return this.currentPhase;
  }

  get kind(): Kind {
    return this.currentKind;
  }

  /**
   * Acquire, run the primary body or dispatch, finalize exactly once, then
   * propagate whatever kind is left
   */
  run<T>(
    acquire: () => T,
    body: ((value: T) => void) | undefined,
    clauses: readonly HandlerClause[],
    finalizer: ((value: T | undefined) => void) | undefined
  ): void {
    this.frameDepth = this.host.enter(this);
    this.host.trace('frame entered', { depth: this.frameDepth });

    let value: T | undefined;
    let pending: { error: unknown } | undefined;

    try {
      const acquired = this.stage('acquire', acquire);
      if (acquired.ok) {
        value = acquired.value;
        this.currentPhase = 'success';
        if (body) {
          const bound = value;
          this.stage('in', () => body(bound));
        }
      }

      if (this.currentPhase === 'raised') {
        this.dispatch(clauses);
      }
    } catch (error) {
      // native exceptions only; raises were consumed by stage()
      pending = { error };
    }

    const finalizerError = this.finalize(finalizer, value);
    if (finalizerError) {
      throw finalizerError.error;
    }
    if (pending) {
      throw pending.error;
    }

    if (!isNoError(this.currentKind)) {
      this.host.trace('kind propagated', { depth: this.frameDepth, kind: formatKind(this.currentKind) });
      throw this.host.signal(this.currentKind);
    }
  }

  /**
   * Run one stage. A raise owned by this frame's context moves the frame to
   * `raised`; anything else escapes.
   */
  private stage<T>(name: Stage, fn: () => T): { ok: true; value: T } | { ok: false } {
    let result: T;
    try {
      result = fn();
    } catch (error) {
      if (!isOwnSignal(error, this.host.owner)) {
        throw error;
      }
      this.recordRaise(name, error.kind);
      return { ok: false };
    }

    if (isThenable(result)) {
      abandon(result, error =>
        this.host.warn('abandoned async scope body rejected', {
          depth: this.frameDepth,
          stage: name,
          error: extractErrorInfo(error),
        })
      );
      throw new ProtocolError(`The ${name} stage of a scope returned a promise; scopes are synchronous`, {
        code: 'ASYNC_SCOPE_BODY',
        data: { depth: this.frameDepth, stage: name },
      });
    }
    return { ok: true, value: result };
  }

  private recordRaise(stage: Stage, kind: Kind): void {
    const previous = this.currentKind;
    this.currentKind = kind;

    this.host.trace('kind raised', { depth: this.frameDepth, stage, kind: formatKind(kind) });

    if (stage === 'acquire' || stage === 'in') {
      this.currentPhase = 'raised';
    } else if (stage === 'finally' && !isNoError(previous) && !kindEquals(previous, kind)) {
      this.host.warn('finalizer raise replaced the pending kind', {
        depth: this.frameDepth,
        replaced: formatKind(previous),
        kind: formatKind(kind),
      });
    }
  }

  private dispatch(clauses: readonly HandlerClause[]): void {
    const kind = this.currentKind;
    // early returns pass straight to the finalizer
    if (!isFault(kind)) {
      return;
    }

    const clause =
      clauses.find(c => c.kinds !== 'any' && c.kinds.some(k => kindEquals(k, kind))) ??
      clauses.find(c => c.kinds === 'any');

    if (!clause) {
      this.host.trace('no handler matched', { depth: this.frameDepth, kind: formatKind(kind) });
      return;
    }

    this.currentPhase = 'handling';
    this.host.trace('handler matched', {
      depth: this.frameDepth,
      kind: formatKind(kind),
      handler: clause.kinds === 'any' ? 'otherwise' : 'catch',
    });

    const handled = this.stage('handler', () => clause.handler(kind));
    if (handled.ok) {
      this.currentKind = NoError;
    }
  }

  private finalize<T>(
    finalizer: ((value: T | undefined) => void) | undefined,
    value: T | undefined
  ): { error: unknown } | undefined {
    this.currentPhase = 'finalizing';
    try {
      if (finalizer) {
        this.stage('finally', () => finalizer(value));
      }
      return undefined;
    } catch (error) {
      return { error };
    } finally {
      this.currentPhase = 'closed';
      this.host.leave(this);
      this.host.trace('frame finalized', { depth: this.frameDepth, kind: formatKind(this.currentKind) });
    }
  }
}

/**
 * Fluent declaration of one protected block: `try(...)`, optional `in`,
 * handlers, then `finally`, which runs it
 */
export class FrameBuilder<T> {
  private body: ((value: T) => void) | undefined;
  private readonly clauses: HandlerClause[] = [];
  private ran = false;

  constructor(
    private readonly host: FrameHost,
    private readonly acquire: () => T
  ) {}

  /**
   * Primary body, run only when acquisition raised nothing
   */
  in(body: (value: T) => void): this {
    if (this.body) {
      throw new ProtocolError('in() declared twice for one scope', { code: 'DUPLICATE_CLAUSE' });
    }
    this.body = body;
    return this;
  }

  /**
   * Declare handlers built with `catching` and `otherwise`
   */
  handle(...clauses: HandlerClause[]): this {
    for (const clause of clauses) {
      this.addClause(clause);
    }
    return this;
  }

  catch(kinds: FaultKind | readonly FaultKind[], handler: Handler): this {
    this.addClause(catching(kinds, handler));
    return this;
  }

  otherwise(handler: Handler): this {
    this.addClause(otherwise(handler));
    return this;
  }

  catchAny(handler: Handler): this {
    return this.otherwise(handler);
  }

  /**
   * Declare the finalizer and run the frame. The finalizer gets the bound
   * value, or `undefined` when acquisition raised.
   */
  finally(finalizer?: (value: T | undefined) => void): void {
    if (this.ran) {
      throw new ProtocolError('A scope runs once; finally() was called again', {
        code: 'SCOPE_ALREADY_RUN',
      });
    }
    this.ran = true;
    new ScopeFrame(this.host).run(this.acquire, this.body, this.clauses, finalizer);
  }

  private addClause(clause: HandlerClause): void {
    if (clause.kinds === 'any' && this.clauses.some(c => c.kinds === 'any')) {
      throw new ProtocolError('Only one otherwise() handler per scope', { code: 'DUPLICATE_CLAUSE' });
    }
    this.clauses.push(clause);
  }
}
