/**
 * Tests for the binding forms that turn values and platform errors into raises
 */

import { describe, it, expect } from 'vitest';
import { ErrorCategory } from '@scopeguard/errors';
import {
  EarlyReturn,
  EnsureViolated,
  KindError,
  NoError,
  NullRef,
  Taxonomy,
  Unrecoverable,
  failed,
  guarded,
  throws,
  toError,
  unwrap,
} from '../index.js';
import { BadInput, ENOENT, Timeout, captureError, protocolCode, testTaxonomy } from './helpers.js';

function platformError(message: string, fields: { code?: string; errno?: number }): Error {
  return Object.assign(new Error(message), fields);
}

describe('Binding forms', () => {
  describe('bind', () => {
    it('should raise NullRef for null and undefined', () => {
      expect(throws([NullRef], ctx => void ctx.bind(null))).toBe(NullRef);
      expect(throws([NullRef], ctx => void ctx.bind(undefined))).toBe(NullRef);
    });

    it('should hand back falsy values that are present', () => {
      const outcome = guarded([], ctx => [ctx.bind(0), ctx.bind(''), ctx.bind(false)]);

      expect(outcome).toEqual({ success: true, data: [0, '', false], kind: NoError });
    });
  });

  describe('maybe', () => {
    it('should raise the given kind for an empty value', () => {
      expect(throws([Timeout], ctx => void ctx.maybe(undefined, Timeout))).toBe(Timeout);
    });

    it('should evaluate its expression once', () => {
      let lookups = 0;
      const lookup = (): string => {
        lookups++;
        return 'value';
      };

      const outcome = guarded([], ctx => ctx.maybe(lookup(), Timeout));

      expect(outcome.data).toBe('value');
      expect(lookups).toBe(1);
    });
  });

  describe('ensure', () => {
    it.each([[false], [0], [''], [null]])('should raise EnsureViolated for %s', condition => {
      expect(throws([], ctx => ctx.ensure(condition))).toBe(EnsureViolated);
    });

    it('should continue on a truthy condition', () => {
      expect(throws([], ctx => ctx.ensure('yes'))).toBe(NoError);
    });
  });

  describe('check', () => {
    it('should raise the kind of a platform error code', () => {
      const kind = throws([ENOENT], ctx =>
        ctx.check(() => {
          throw platformError('missing', { code: 'ENOENT', errno: -2 });
        })
      );

      expect(kind).toBe(ENOENT);
    });

    it('should classify through the taxonomy given in the options', () => {
      const taxonomy = new Taxonomy('files');
      const NotFound = taxonomy.define('NotFound', { code: 'ENOENT', value: 2, category: 'filesystem' });

      const kind = throws(
        [],
        ctx =>
          ctx.check(() => {
            throw platformError('missing', { code: 'ENOENT' });
          }),
        { taxonomy }
      );

      expect(kind).toBe(NotFound);
    });

    it('should raise Unrecoverable for a platform code nobody defined', () => {
      const kind = throws([], ctx =>
        ctx.check(() => {
          throw platformError('odd', { code: 'EMADEUP' });
        })
      );

      expect(kind).toBe(Unrecoverable);
    });

    it('should raise the kind carried by a KindError', () => {
      const kind = throws([], ctx => ctx.check(() => unwrap(failed(BadInput))));

      expect(kind).toBe(BadInput);
    });

    it('should let other exceptions escape unconverted', () => {
      expect(() =>
        throws([], ctx =>
          ctx.check(() => {
            throw new RangeError('plain');
          })
        )
      ).toThrow(RangeError);
    });

    it('should return the value of a successful operation', () => {
      expect(guarded([], ctx => ctx.check(() => 7))).toEqual({ success: true, data: 7, kind: NoError });
    });
  });

  describe('inherit', () => {
    it('should continue on NoError and raise a fault', () => {
      const events: string[] = [];

      const kind = throws([Timeout], ctx => {
        ctx.inherit(throws([], () => undefined));
        events.push('after NoError');
        ctx.inherit(throws([Timeout], callee => callee.throw(Timeout)));
        events.push('after Timeout');
      });

      expect(kind).toBe(Timeout);
      expect(events).toEqual(['after NoError']);
    });

    it('should unpack a successful outcome and raise a failed one', () => {
      const events: string[] = [];

      const kind = throws([BadInput], ctx => {
        const parsed = ctx.inherit(guarded([], () => 5));
        events.push(`parsed ${parsed}`);
        ctx.inherit(failed<number>(BadInput));
      });

      expect(kind).toBe(BadInput);
      expect(events).toEqual(['parsed 5']);
    });

    it('should refuse an EarlyReturn', () => {
      expect(protocolCode(() => throws([], ctx => ctx.inherit(EarlyReturn)))).toBe(
        'SENTINEL_INHERITED'
      );
    });
  });
});

describe('Exception interop', () => {
  it('should carry the kind on a KindError', () => {
    const error = toError(Timeout, 'fetch');

    expect(error).toBeInstanceOf(KindError);
    expect(error.kind).toBe(Timeout);
    expect(error.code).toBe('KIND_RAISED');
    expect(error.message).toBe(`Timeout(${Timeout.value}): Peer did not answer in time`);
    expect(error.metadata.category).toBe(ErrorCategory.KIND);
    expect(error.metadata.context.operation).toBe('fetch');
  });

  it('should use the platform code when the kind has one', () => {
    expect(toError(ENOENT).code).toBe('ENOENT');
  });

  it('should unwrap outcomes', () => {
    expect(unwrap(guarded([], () => 'data'))).toBe('data');

    const error = captureError(() => unwrap(guarded<string>([BadInput], ctx => ctx.throw(BadInput))));
    expect(error).toBeInstanceOf(KindError);
    expect(error instanceof KindError && error.kind).toBe(BadInput);
  });

  it('should keep test kinds in the extended taxonomy', () => {
    expect(testTaxonomy.require('Timeout')).toBe(Timeout);
  });
});
