/**
 * Tests for protocol options read from configuration
 */

import { fileURLToPath } from 'url';

import { describe, it, expect } from 'vitest';
import { ConfigValidationError } from '@scopeguard/configuration';
import { LogLevel, LoggerFactory } from '@scopeguard/logging';
import { ProtocolConfigSchema, loadProtocolOptions, toProtocolOptions } from '../index.js';

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('Protocol options', () => {
  it('should fill defaults for an empty configuration', () => {
    expect(ProtocolConfigSchema.parse({})).toEqual({
      logging: { level: 'INFO', format: 'text' },
      trace: false,
      strict_declarations: false,
    });
  });

  it('should map configuration fields onto options', () => {
    const { logger } = LoggerFactory.createMemoryLogger('test');
    const options = toProtocolOptions(
      ProtocolConfigSchema.parse({ trace: true, strict_declarations: true }),
      logger
    );

    expect(options).toEqual({ logger, trace: true, strictDeclarations: true });
  });

  it('should build a logger from the logging block', () => {
    const options = toProtocolOptions(
      ProtocolConfigSchema.parse({ logging: { level: 'WARN', format: 'json' } })
    );

    expect(options.logger?.getComponent()).toBe('scopeguard');
    expect(options.logger?.getLevel()).toBe(LogLevel.WARN);
  });

  it('should load a YAML file with environment defaults', async () => {
    const options = await loadProtocolOptions(fixture('protocol.yaml'), { env: {} });

    expect(options.trace).toBe(true);
    expect(options.strictDeclarations).toBe(true);
    expect(options.logger?.getLevel()).toBe(LogLevel.DEBUG);
  });

  it('should substitute environment variables', async () => {
    const options = await loadProtocolOptions(fixture('protocol.yaml'), {
      env: { SCOPEGUARD_LOG_LEVEL: 'ERROR' },
    });

    expect(options.logger?.getLevel()).toBe(LogLevel.ERROR);
  });

  it('should report every invalid field', async () => {
    const error = await loadProtocolOptions(fixture('invalid.yaml'), { env: {} }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(ConfigValidationError);
    const fields =
      error instanceof ConfigValidationError
        ? error.getFormattedErrors().map(line => line.split(':')[0])
        : [];
    expect(fields).toEqual(['logging.level', 'trace']);
  });
});
