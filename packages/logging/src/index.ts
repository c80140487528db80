export { Logger } from './logger.js';
export { LoggerFactory } from './factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { MemoryTransport } from './transports/memory-transport.js';
export { formatEntry, formatJson, formatText } from './format.js';
export {
  LOG_LEVELS,
  LOG_FORMATS,
  LogLevel,
  isLogLevel,
  isLogFormat,
  type LogLevelString,
  type LogFormat,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ConsoleTransportConfig,
  type MemoryTransportConfig,
  type LogData,
} from './types.js';
