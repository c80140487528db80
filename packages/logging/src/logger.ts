import { ConsoleTransport } from './transports/console-transport.js';
import { LogLevel, type LogData, type LogEntry, type LogTransport, type LoggerConfig } from './types.js';

/**
 * Structured logger with multiple transport support
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string;
  private transports: LogTransport[];
  private readonly bindings: LogData;

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level = typeof config.level === 'string' ? Logger.parseLogLevel(config.level) : config.level;
    this.transports = config.transports ?? [new ConsoleTransport()];
    this.bindings = config.bindings ?? {};
  }

  /**
   * Create a child logger for a sub-component, optionally binding extra fields
   * that are merged into every entry it writes
   */
  child(component: string, bindings: LogData = {}): Logger {
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: this.transports,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    const errorObj = error instanceof Error ? error : undefined;
    this.log(LogLevel.ERROR, message, data, errorObj);
  }

  /**
   * Whether entries at the given level would be written
   */
  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  setLevel(level: LogLevel | string): void {
    this.level = typeof level === 'string' ? Logger.parseLogLevel(level) : level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getComponent(): string {
    return this.component;
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  removeTransport(transportName: string): void {
    this.transports = this.transports.filter(t => t.name !== transportName);
  }

  /**
   * Close all transports
   */
  async close(): Promise<void> {
    await Promise.all(this.transports.map(t => t.close?.()));
  }

  private log(level: LogLevel, message: string, data?: LogData, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const merged = { ...this.bindings, ...data };
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(Object.keys(merged).length > 0 && { data: merged }),
      ...(error && { error }),
    };

    this.transports.forEach(transport => {
      transport.log(entry).catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(`Transport ${transport.name} failed:`, err);
      });
    });
  }

  static parseLogLevel(level: string): LogLevel {
    switch (level.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
      case 'WARNING':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        throw new Error(`Invalid log level: ${level}`);
    }
  }
}
