import type { SupplicantController } from '@wlanctl/lifecycle';
import type { Logger } from '@wlanctl/logging';

import type { CommandRunner } from './exec.js';
import { ManagedProcess, type ProcessSpawner } from './process.js';

export interface SupplicantManagerOptions {
  binary: string;
  args: readonly string[];
  logger: Logger;
  spawner?: ProcessSpawner;
  runner?: CommandRunner;
}

export class SupplicantManager implements SupplicantController {
  private readonly process: ManagedProcess;

  constructor(private readonly options: SupplicantManagerOptions) {
    this.process = new ManagedProcess({
      binary: options.binary,
      logger: options.logger.child('supplicant'),
      ...(options.spawner && { spawner: options.spawner }),
      ...(options.runner && { runner: options.runner }),
    });
  }

  start(): Promise<boolean> {
    return this.process.start(this.options.args);
  }

  stop(): Promise<boolean> {
    return this.process.stop();
  }
}
