import type { ChildProcess } from 'child_process';
import { EventEmitter, once } from 'events';
import { createInterface } from 'readline';

import type { Logger } from '@wlanctl/logging';

import { parseIwEventLine, type IwEvent } from './parsers.js';
import { spawnProcess, type ProcessSpawner } from './process.js';

export interface IwEventMonitorOptions {
  iwBinary?: string;
  logger: Logger;
  spawner?: ProcessSpawner;
}

/**
 * Follows `iw event` and emits an `event` for every station or regulatory-domain line
 */
export class IwEventMonitor extends EventEmitter {
  private child: ChildProcess | undefined;
  private stopping = false;
  private readonly logger: Logger;

  constructor(private readonly options: IwEventMonitorOptions) {
    super();
    this.logger = options.logger.child('iw-event');
  }

  isRunning(): boolean {
    return this.child !== undefined;
  }

  start(): void {
    if (this.child) {
      return;
    }

    this.stopping = false;
    const spawner = this.options.spawner ?? spawnProcess;
    const child = spawner(this.options.iwBinary ?? 'iw', ['event']);
    this.child = child;

    if (child.stdout) {
      const lines = createInterface({ input: child.stdout });
      lines.on('line', line => this.handleLine(line));
    }

    child.on('error', error => {
      this.logger.error('Failed to run iw event', error);
      this.child = undefined;
    });

    child.on('exit', (code, signal) => {
      if (!this.stopping) {
        this.logger.warn('iw event exited unexpectedly', { code, signal });
      }
      this.child = undefined;
    });

    this.logger.info('Monitoring kernel wireless events');
  }

  async stop(): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }

    this.stopping = true;
    if (child.exitCode === null && child.signalCode === null) {
      const exited = once(child, 'exit');
      child.kill('SIGTERM');
      await exited;
    }
    this.child = undefined;
  }

  handleLine(line: string): void {
    const event = parseIwEventLine(line);
    if (event) {
      this.emit('event', event);
    }
  }

  onEvent(listener: (event: IwEvent) => void): this {
    return this.on('event', listener);
  }
}
