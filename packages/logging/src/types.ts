/**
 * Logging types and interfaces for structured logging
 */

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevelString = (typeof LOG_LEVELS)[number];

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export const LOG_FORMATS = ['json', 'text'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export interface LogEntry {
  readonly timestamp: Date;
  readonly level: LogLevel;
  readonly component: string;
  readonly message: string;
  readonly data?: Readonly<Record<string, unknown>>;
  readonly error?: Error;
}

export interface LogTransport {
  readonly name: string;
  log(entry: LogEntry): Promise<void>;
  close?(): Promise<void>;
}

export interface LoggerConfig {
  readonly level: LogLevel | LogLevelString;
  readonly component: string;
  readonly transports?: LogTransport[];
  /** Fields merged into the data of every entry */
  readonly bindings?: Readonly<Record<string, unknown>>;
}

export interface ConsoleTransportConfig {
  readonly format?: LogFormat;
  readonly colors?: boolean;
}

export interface MemoryTransportConfig {
  /** Oldest entries are dropped past this many */
  readonly maxEntries?: number;
}

export const isLogLevel = (value: string): value is LogLevelString =>
  LOG_LEVELS.some(level => level === value);

export const isLogFormat = (value: string): value is LogFormat =>
  LOG_FORMATS.some(format => format === value);

export type LogData = Readonly<Record<string, unknown>>;
