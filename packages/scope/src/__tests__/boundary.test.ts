/**
 * Tests for the function boundary: throws, guarded and protect
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LogLevel, LoggerFactory, type Logger, type MemoryTransport } from '@scopeguard/logging';
import {
  EnsureViolated,
  NoError,
  formatKind,
  guarded,
  protect,
  throws,
  type FunctionErrorContext,
} from '../index.js';
import { BadInput, Timeout, protocolCode } from './helpers.js';

describe('Function boundary', () => {
  describe('throws', () => {
    it('should return NoError when the body completes', () => {
      const declared: string[] = [];

      const kind = throws([Timeout, BadInput], ctx => {
        declared.push(...ctx.declared.map(k => k.name));
      });

      expect(kind).toBe(NoError);
      expect(declared).toEqual(['Timeout', 'BadInput']);
    });

    it('should turn an early return into NoError after every finalizer ran', () => {
      const events: string[] = [];

      const kind = throws([], ctx => {
        ctx
          .try()
          .in(() => {
            ctx
              .try()
              .in(() => ctx.return())
              .otherwise(() => events.push('inner otherwise'))
              .finally(() => events.push('inner finally'));
            events.push('after inner');
          })
          .otherwise(() => events.push('outer otherwise'))
          .finally(() => events.push('outer finally'));
        events.push('after outer');
      });

      expect(kind).toBe(NoError);
      expect(events).toEqual(['inner finally', 'outer finally']);
    });

    it('should return a raise that no frame handled', () => {
      expect(throws([Timeout], ctx => ctx.throw(Timeout))).toBe(Timeout);
    });

    it('should reject an asynchronous body', () => {
      expect(protocolCode(() => throws([], async () => undefined))).toBe('ASYNC_SCOPE_BODY');
    });

    it('should report a rejection from an abandoned async body', async () => {
      const { logger, transport } = LoggerFactory.createMemoryLogger('test');

      const code = protocolCode(() =>
        throws(
          [],
          async () => {
            await Promise.resolve();
            throw new Error('late failure');
          },
          { logger }
        )
      );
      await new Promise(resolve => setTimeout(resolve, 0));

      expect(code).toBe('ASYNC_SCOPE_BODY');
      const warnings = transport.getEntries(LogLevel.WARN);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.message).toBe('abandoned async function body rejected');
      expect(warnings[0]?.data).toMatchObject({ error: { name: 'Error', message: 'late failure' } });
    });

    it('should close the context when a native exception escapes', () => {
      const contexts: FunctionErrorContext[] = [];

      expect(() =>
        throws([], ctx => {
          contexts.push(ctx);
          throw new Error('native');
        })
      ).toThrow('native');
      expect(contexts[0]?.isClosed()).toBe(true);
    });
  });

  describe('guarded', () => {
    it('should return the body value as a successful outcome', () => {
      expect(guarded([], () => 42)).toEqual({ success: true, data: 42, kind: NoError });
    });

    it('should return the value given to return', () => {
      const outcome = guarded<string>([], ctx => {
        ctx
          .try()
          .in(() => ctx.return('early'))
          .finally();
        return 'late';
      });

      expect(outcome).toEqual({ success: true, data: 'early', kind: NoError });
    });

    it('should return an escaped fault as a failed outcome', () => {
      const outcome = guarded<number>([Timeout], ctx => ctx.throw(Timeout));

      expect(outcome).toEqual({ success: false, kind: Timeout, error: Timeout });
    });
  });

  describe('protect', () => {
    const contexts = new Set<string>();
    const parse = protect([EnsureViolated], (ctx: FunctionErrorContext<number>, text: string) => {
      contexts.add(ctx.id);
      const value = Number(text);
      ctx.ensure(!Number.isNaN(value));
      return value;
    });

    it('should open a fresh context for every call', () => {
      expect(parse('12')).toEqual({ success: true, data: 12, kind: NoError });
      expect(parse('twelve')).toEqual({ success: false, kind: EnsureViolated, error: EnsureViolated });
      expect(contexts.size).toBe(2);
    });
  });

  describe('logging', () => {
    let logger: Logger;
    let transport: MemoryTransport;

    beforeEach(() => {
      ({ logger, transport } = LoggerFactory.createMemoryLogger('test'));
    });

    it('should trace frame transitions when tracing is on', () => {
      throws(
        [],
        ctx => {
          ctx
            .try()
            .in(() => ctx.throw(Timeout))
            .catch(Timeout, () => undefined)
            .finally();
        },
        { logger, trace: true, name: 'load' }
      );

      expect(transport.getMessages()).toEqual([
        'function entered',
        'frame entered',
        'kind raised',
        'handler matched',
        'frame finalized',
        'function returned',
      ]);
      expect(transport.getEntries()[0]?.component).toBe('test:load');
      expect(transport.getEntries(LogLevel.DEBUG)).toHaveLength(6);
    });

    it('should trace propagation out of a frame', () => {
      throws(
        [Timeout],
        ctx => {
          ctx
            .try()
            .in(() => ctx.throw(Timeout))
            .finally();
        },
        { logger, trace: true }
      );

      expect(transport.getMessages()).toEqual([
        'function entered',
        'frame entered',
        'kind raised',
        'no handler matched',
        'frame finalized',
        'kind propagated',
        'function returned',
      ]);
      expect(transport.getEntries().at(-1)?.data).toMatchObject({ kind: formatKind(Timeout) });
    });

    it('should stay quiet without tracing', () => {
      throws([], ctx => ctx.try().finally(), { logger });

      expect(transport.getMessages()).toEqual([]);
    });

    it('should warn when an undeclared kind escapes under strict declarations', () => {
      throws([BadInput], ctx => ctx.throw(Timeout), { logger, strictDeclarations: true });
      throws([BadInput], ctx => ctx.throw(BadInput), { logger, strictDeclarations: true });

      const warnings = transport.getEntries(LogLevel.WARN);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.message).toBe('undeclared kind escaped');
      expect(warnings[0]?.data).toMatchObject({
        kind: formatKind(Timeout),
        declared: [formatKind(BadInput)],
      });
    });

    it('should not warn about undeclared kinds by default', () => {
      throws([BadInput], ctx => ctx.throw(Timeout), { logger });

      expect(transport.getEntries(LogLevel.WARN)).toEqual([]);
    });
  });
});
