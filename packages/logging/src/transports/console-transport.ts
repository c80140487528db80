import { formatEntry } from '../format.js';
import { LogLevel, type ConsoleTransportConfig, type LogEntry, type LogTransport } from '../types.js';

/**
 * Console transport for logging to stdout/stderr
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private readonly format: NonNullable<ConsoleTransportConfig['format']>;
  private readonly colors: boolean;

  constructor(config: ConsoleTransportConfig = {}) {
    this.format = config.format ?? 'text';
    this.colors = config.colors ?? true;
  }

  async log(entry: LogEntry): Promise<void> {
    const output = formatEntry(entry, this.format, this.colors && this.format === 'text');

    /* eslint-disable no-console */
    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(output);
        break;
      case LogLevel.INFO:
        console.info(output);
        break;
      case LogLevel.WARN:
        console.warn(output);
        break;
      case LogLevel.ERROR:
        console.error(output);
        break;
      default:
        console.log(output);
    }
    /* eslint-enable no-console */
  }
}
