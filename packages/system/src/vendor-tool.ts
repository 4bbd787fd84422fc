import type { VendorTool } from '@wlanctl/lifecycle';
import type { Logger } from '@wlanctl/logging';

import { runCommand, type CommandRunner } from './exec.js';

export interface CommandLineVendorToolOptions {
  enabled: boolean;
  path: string;
  logger: Logger;
  runner?: CommandRunner;
}

/**
 * Vendor soft-AP command line tool. Command tokens are passed on without the leading prefix.
 */
export class CommandLineVendorTool implements VendorTool {
  private readonly logger: Logger;
  private readonly runner: CommandRunner;

  constructor(private readonly options: CommandLineVendorToolOptions) {
    this.logger = options.logger.child('vendor-tool');
    this.runner = options.runner ?? runCommand;
  }

  exec(args: readonly string[]): Promise<boolean> {
    return this.run(args.slice(1));
  }

  addOrRemoveInterface(interfaceName: string, add: boolean): Promise<boolean> {
    return this.run([add ? 'create' : 'remove', interfaceName]);
  }

  controlBridge(args: readonly string[]): Promise<boolean> {
    return this.run(args.slice(1));
  }

  setSoftap(args: readonly string[]): Promise<boolean> {
    return this.run(args.slice(1));
  }

  private async run(args: readonly string[]): Promise<boolean> {
    if (!this.options.enabled) {
      this.logger.warn('Vendor tool disabled, ignoring command', { args: [...args] });
      return false;
    }

    try {
      const { stdout } = await this.runner(this.options.path, args);
      this.logger.debug(`${this.options.path} ${args.join(' ')}`, { output: stdout.trim() });
      return true;
    } catch (error) {
      this.logger.error(`Vendor tool failed: ${args.join(' ')}`, error);
      return false;
    }
  }
}
