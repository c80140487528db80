import { formatText } from '../format.js';
import type { LogEntry, LogLevel, LogTransport, MemoryTransportConfig } from '../types.js';

/**
 * Keeps entries in memory, for tests and for attaching recent history to
 * diagnostics
 */
export class MemoryTransport implements LogTransport {
  public readonly name = 'memory';
  private entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(config: MemoryTransportConfig = {}) {
    this.maxEntries = Math.max(0, config.maxEntries ?? 1000);
  }

  async log(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
  }

  getEntries(level?: LogLevel): readonly LogEntry[] {
    return level === undefined ? [...this.entries] : this.entries.filter(e => e.level === level);
  }

  /** Messages only, in the order they were logged */
  getMessages(): string[] {
    return this.entries.map(e => e.message);
  }

  render(): string[] {
    return this.entries.map(e => formatText(e));
  }

  clear(): void {
    this.entries = [];
  }
}
