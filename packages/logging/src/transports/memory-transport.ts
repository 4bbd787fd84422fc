import type { LogEntry, LogLevel, LogTransport } from '../types.js';

/**
 * Keeps entries in memory. Entries are recorded synchronously, before `log` resolves.
 */
export class MemoryTransport implements LogTransport {
  public readonly name = 'memory';
  private readonly entries: LogEntry[] = [];

  async log(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
  }

  getEntries(level?: LogLevel): LogEntry[] {
    return level === undefined ? [...this.entries] : this.entries.filter(e => e.level === level);
  }

  getMessages(level?: LogLevel): string[] {
    return this.getEntries(level).map(e => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
