import { spawn, type ChildProcess } from 'child_process';
import path from 'path';

import type { Logger } from '@wlanctl/logging';

import { exitCodeOf, runCommand, type CommandRunner } from './exec.js';

export type ProcessSpawner = (binary: string, args: readonly string[]) => ChildProcess;

export const spawnProcess: ProcessSpawner = (binary, args) =>
  spawn(binary, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

export interface ManagedProcessOptions {
  /** Executable path; its basename is used to kill instances started elsewhere */
  binary: string;
  logger: Logger;
  spawner?: ProcessSpawner;
  runner?: CommandRunner;
}

/**
 * A long-running daemon child process. Stopping is always SIGKILL.
 */
export class ManagedProcess {
  private child: ChildProcess | undefined;
  private readonly binary: string;
  private readonly logger: Logger;
  private readonly spawner: ProcessSpawner;
  private readonly runner: CommandRunner;

  constructor(options: ManagedProcessOptions) {
    this.binary = options.binary;
    this.logger = options.logger;
    this.spawner = options.spawner ?? spawnProcess;
    this.runner = options.runner ?? runCommand;
  }

  isRunning(): boolean {
    return this.child !== undefined;
  }

  /**
   * Resolves true once the process has spawned, false if it could not be started
   */
  start(args: readonly string[]): Promise<boolean> {
    if (this.child) {
      this.logger.warn(`${this.binary} already running`, { pid: this.child.pid });
      return Promise.resolve(true);
    }

    return new Promise(resolve => {
      const child = this.spawner(this.binary, args);

      child.stdout?.on('data', (data: Buffer) => {
        this.logger.debug(data.toString().trim());
      });
      child.stderr?.on('data', (data: Buffer) => {
        this.logger.warn(data.toString().trim());
      });

      child.once('spawn', () => {
        this.child = child;
        this.logger.info(`Started ${this.binary}`, { pid: child.pid, args: [...args] });
        resolve(true);
      });

      child.once('error', error => {
        this.logger.error(`Failed to start ${this.binary}`, error);
        if (this.child === child) {
          this.child = undefined;
        }
        resolve(false);
      });

      child.once('exit', (code, signal) => {
        this.logger.info(`${this.binary} exited`, { code, signal });
        if (this.child === child) {
          this.child = undefined;
        }
      });
    });
  }

  /**
   * Kill the process this instance started, or any running instance of the binary when
   * none was started here. Resolves true when nothing is left running.
   */
  async stop(): Promise<boolean> {
    const child = this.child;
    if (child) {
      this.child = undefined;
      return child.kill('SIGKILL');
    }

    const name = path.basename(this.binary);
    try {
      await this.runner('pkill', ['-KILL', '-x', name]);
      this.logger.info(`Killed running ${name}`);
      return true;
    } catch (error) {
      // pkill exits 1 when nothing matched
      if (exitCodeOf(error) === 1) {
        return true;
      }
      this.logger.error(`Failed to kill ${name}`, error);
      return false;
    }
  }
}
