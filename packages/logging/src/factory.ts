import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { MemoryTransport } from './transports/memory-transport.js';
import { LogLevel, type LogFormat, type LogLevelString } from './types.js';

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger with a colored text console transport
   */
  static createConsoleLogger(
    component: string,
    level: LogLevel | LogLevelString = LogLevel.INFO
  ): Logger {
    return new Logger({
      component,
      level,
      transports: [new ConsoleTransport({ format: 'text', colors: true })],
    });
  }

  /**
   * Create a structured JSON logger for production environments
   */
  static createStructuredLogger(
    component: string,
    level: LogLevel | LogLevelString = LogLevel.INFO
  ): Logger {
    return new Logger({
      component,
      level,
      transports: [new ConsoleTransport({ format: 'json', colors: false })],
    });
  }

  /**
   * Create a console logger from a `{ level, format }` configuration block
   */
  static fromConfig(
    component: string,
    config: { level: LogLevelString; format: LogFormat }
  ): Logger {
    return config.format === 'json'
      ? LoggerFactory.createStructuredLogger(component, config.level)
      : LoggerFactory.createConsoleLogger(component, config.level);
  }

  /**
   * Create a logger that records into memory; the transport is returned so
   * callers can read the entries back
   */
  static createMemoryLogger(
    component: string,
    level: LogLevel | LogLevelString = LogLevel.DEBUG
  ): { logger: Logger; transport: MemoryTransport } {
    const transport = new MemoryTransport();
    return {
      logger: new Logger({ component, level, transports: [transport] }),
      transport,
    };
  }
}
