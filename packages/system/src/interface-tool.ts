import { parseMacAddress, type InterfaceTool, type MacAddress } from '@wlanctl/lifecycle';
import type { Logger } from '@wlanctl/logging';

import { readSysfs, runCommand, type CommandRunner, type SysfsReader } from './exec.js';

export const SYS_CLASS_NET = '/sys/class/net';

export interface SystemInterfaceToolOptions {
  logger: Logger;
  ipBinary?: string;
  sysfsRoot?: string;
  runner?: CommandRunner;
  readSysfs?: SysfsReader;
}

/**
 * `ip link` and `/sys/class/net` backed interface operations
 */
export class SystemInterfaceTool implements InterfaceTool {
  private readonly logger: Logger;
  private readonly ipBinary: string;
  private readonly sysfsRoot: string;
  private readonly runner: CommandRunner;
  private readonly read: SysfsReader;

  constructor(options: SystemInterfaceToolOptions) {
    this.logger = options.logger.child('iface');
    this.ipBinary = options.ipBinary ?? 'ip';
    this.sysfsRoot = options.sysfsRoot ?? SYS_CLASS_NET;
    this.runner = options.runner ?? runCommand;
    this.read = options.readSysfs ?? readSysfs;
  }

  async setUpState(interfaceName: string, up: boolean): Promise<boolean> {
    try {
      await this.runner(this.ipBinary, ['link', 'set', 'dev', interfaceName, up ? 'up' : 'down']);
      return true;
    } catch (error) {
      this.logger.error(`Failed to set ${interfaceName} ${up ? 'up' : 'down'}`, error);
      return false;
    }
  }

  async nameToIndex(interfaceName: string): Promise<number | undefined> {
    const text = await this.read(`${this.sysfsRoot}/${interfaceName}/ifindex`);
    if (text === undefined) {
      return undefined;
    }
    const index = parseInt(text, 10);
    return Number.isInteger(index) && index > 0 ? index : undefined;
  }

  async getHardwareAddress(interfaceName: string): Promise<MacAddress> {
    const text = await this.read(`${this.sysfsRoot}/${interfaceName}/address`);
    const mac = text === undefined ? undefined : parseMacAddress(text);
    if (!mac) {
      throw new Error(`No hardware address for ${interfaceName}`);
    }
    return mac;
  }
}
