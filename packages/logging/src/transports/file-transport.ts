import { promises as fs } from 'fs';
import path from 'path';

import { formatJson, formatText } from '../format.js';
import type { FileTransportConfig, LogEntry, LogTransport } from '../types.js';

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export function parseSize(sizeStr: string): number {
  const match = sizeStr.match(/^(\d+(?:\.\d+)?)\s*([KMG]?B)$/i);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid size format: ${sizeStr}`);
  }

  return parseFloat(match[1]) * (SIZE_UNITS[match[2].toUpperCase()] ?? 1);
}

/**
 * File transport with size-based rotation (`daemon.log`, `daemon.log.1`, ...)
 */
export class FileTransport implements LogTransport {
  public readonly name = 'file';
  private readonly config: Required<FileTransportConfig>;
  private readonly maxSizeBytes: number;
  // Appends are chained so rotation never races a pending write
  private pending: Promise<void>;

  constructor(config: FileTransportConfig) {
    this.config = {
      maxSize: '10MB',
      maxFiles: 3,
      format: 'text',
      ...config,
    };

    this.maxSizeBytes = parseSize(this.config.maxSize);
    this.pending = fs.mkdir(path.dirname(this.config.filename), { recursive: true }).then(
      () => undefined,
      error => this.reportFailure('create log directory', error)
    );
  }

  log(entry: LogEntry): Promise<void> {
    const line = this.config.format === 'json' ? formatJson(entry) : formatText(entry);

    this.pending = this.pending.then(() =>
      this.write(line).catch(error => this.reportFailure('write to log file', error))
    );
    return this.pending;
  }

  close(): Promise<void> {
    return this.pending;
  }

  private async write(line: string): Promise<void> {
    if (await this.needsRotation()) {
      await this.rotate();
    }
    await fs.appendFile(this.config.filename, `${line}\n`);
  }

  private async needsRotation(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.config.filename);
      return stats.size >= this.maxSizeBytes;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  private async rotate(): Promise<void> {
    // Shift filename.N-1 -> filename.N, dropping the oldest
    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      await this.renameIfPresent(`${this.config.filename}.${i}`, `${this.config.filename}.${i + 1}`);
    }
    await this.renameIfPresent(this.config.filename, `${this.config.filename}.1`);
  }

  private async renameIfPresent(from: string, to: string): Promise<void> {
    try {
      await fs.rename(from, to);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }

  private reportFailure(action: string, error: unknown): void {
    // eslint-disable-next-line no-console
    console.error(`Failed to ${action}: ${error instanceof Error ? error.message : String(error)}`);
  }
}
