import {
  InterfaceMode,
  KernelEventHub,
  createInterfaceDescriptor,
  createRadioHandle,
  isRadioHandle,
  type BandInfo,
  type InterfaceDescriptor,
  type NetlinkClient,
  type RadioHandle,
  type RegDomainChangeHandler,
  type StationEventHandler,
  type SubscriptionToken,
} from '@wlanctl/lifecycle';
import type { Logger } from '@wlanctl/logging';

import { readSysfs, runCommand, type CommandRunner, type SysfsReader } from './exec.js';
import { SYS_CLASS_NET } from './interface-tool.js';
import { IwEventMonitor } from './iw-event-monitor.js';
import { parseIwDev, parseIwPhyBands, type IwDevEntry, type IwEvent } from './parsers.js';
import type { ProcessSpawner } from './process.js';

export interface SystemNetlinkClientOptions {
  logger: Logger;
  iwBinary?: string;
  sysfsRoot?: string;
  runner?: CommandRunner;
  readSysfs?: SysfsReader;
  spawner?: ProcessSpawner;
}

/**
 * Kernel wireless state through `iw` and sysfs. Station and regulatory-domain events
 * come from `iw event` and are delivered through a KernelEventHub.
 */
export class SystemNetlinkClient implements NetlinkClient {
  readonly hub: KernelEventHub;
  private readonly logger: Logger;
  private readonly iwBinary: string;
  private readonly sysfsRoot: string;
  private readonly runner: CommandRunner;
  private readonly read: SysfsReader;
  private readonly monitor: IwEventMonitor;

  constructor(options: SystemNetlinkClientOptions) {
    this.logger = options.logger.child('netlink');
    this.hub = new KernelEventHub(this.logger.child('events'));
    this.iwBinary = options.iwBinary ?? 'iw';
    this.sysfsRoot = options.sysfsRoot ?? SYS_CLASS_NET;
    this.runner = options.runner ?? runCommand;
    this.read = options.readSysfs ?? readSysfs;
    this.monitor = new IwEventMonitor({
      iwBinary: this.iwBinary,
      logger: this.logger,
      ...(options.spawner && { spawner: options.spawner }),
    });
    this.monitor.onEvent(event => {
      this.publish(event).catch((error: unknown) => {
        this.logger.error('Failed to publish kernel event', error);
      });
    });
  }

  async resolveRadio(interfaceName: string): Promise<RadioHandle | undefined> {
    const text = await this.read(`${this.sysfsRoot}/${interfaceName}/phy80211/index`);
    if (text === undefined) {
      this.logger.debug(`${interfaceName} is not a wireless interface`);
      return undefined;
    }
    const index = parseInt(text, 10);
    return isRadioHandle(index) ? index : undefined;
  }

  async enumerateInterfaces(radio: RadioHandle): Promise<InterfaceDescriptor[]> {
    const seen = new Set<number>();
    const descriptors: InterfaceDescriptor[] = [];

    for (const entry of await this.listDevices()) {
      if (entry.phy !== radio) {
        continue;
      }
      if (seen.has(entry.ifindex)) {
        this.logger.warn('Dropping interface with duplicate index', {
          name: entry.name,
          index: entry.ifindex,
        });
        continue;
      }
      seen.add(entry.ifindex);
      descriptors.push(createInterfaceDescriptor(entry.name, entry.ifindex, entry.macAddress));
    }

    return descriptors;
  }

  async setInterfaceMode(interfaceIndex: number, mode: InterfaceMode): Promise<boolean> {
    const entry = (await this.listDevices()).find(device => device.ifindex === interfaceIndex);
    if (!entry) {
      this.logger.warn('No wireless interface with index', { interfaceIndex });
      return false;
    }

    const type = mode === InterfaceMode.AP ? '__ap' : 'managed';
    try {
      await this.runner(this.iwBinary, ['dev', entry.name, 'set', 'type', type]);
      return true;
    } catch (error) {
      this.logger.error(`Failed to set ${entry.name} to ${type}`, error);
      return false;
    }
  }

  async getSupportedBands(radio: RadioHandle): Promise<BandInfo> {
    const { stdout } = await this.runner(this.iwBinary, ['phy', `phy${radio}`, 'info']);
    return parseIwPhyBands(stdout);
  }

  subscribeStationEvents(interfaceIndex: number, handler: StationEventHandler): SubscriptionToken {
    return this.hub.subscribeStationEvents(interfaceIndex, handler);
  }

  subscribeRegDomainChange(radio: RadioHandle, handler: RegDomainChangeHandler): SubscriptionToken {
    return this.hub.subscribeRegDomainChange(radio, handler);
  }

  unsubscribe(token: SubscriptionToken): Promise<void> {
    return this.hub.unsubscribe(token);
  }

  startEventMonitor(): void {
    this.monitor.start();
  }

  /**
   * Stop following kernel events and deliver whatever is still queued
   */
  async close(): Promise<void> {
    await this.monitor.stop();
    await this.hub.flush();
  }

  /**
   * Route a parsed `iw event` line to the hub. Global regulatory changes go to every
   * subscribed radio.
   */
  async publish(event: IwEvent): Promise<void> {
    if (event.type === 'station') {
      const text = await this.read(`${this.sysfsRoot}/${event.interfaceName}/ifindex`);
      const index = text === undefined ? NaN : parseInt(text, 10);
      if (!Number.isInteger(index)) {
        this.logger.debug('Station event for unknown interface', { name: event.interfaceName });
        return;
      }
      this.hub.publishStationEvent(index, event.kind, event.macAddress);
      return;
    }

    const radios =
      event.phy === undefined ? this.hub.getRegDomainRadios() : [createRadioHandle(event.phy)];
    for (const radio of radios) {
      this.hub.publishRegDomainChange(radio, event.countryCode);
    }
  }

  private async listDevices(): Promise<IwDevEntry[]> {
    const { stdout } = await this.runner(this.iwBinary, ['dev']);
    return parseIwDev(stdout);
  }
}
