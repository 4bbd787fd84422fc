import {
  ConflictError,
  KernelError,
  NoUsableInterfaceError,
  RadioNotFoundError,
  failure,
  safeAsync,
  success,
  type Result,
} from '@wlanctl/errors';
import type { Logger } from '@wlanctl/logging';

import type {
  HostapdController,
  InterfaceTool,
  NetlinkClient,
  SubscriptionToken,
  SupplicantController,
} from './collaborators.js';
import { AccessPointInterfaceController } from './controllers/ap-interface.js';
import { StationInterfaceController } from './controllers/station-interface.js';
import { EventListenerRegistry } from './events/registry.js';
import type { InterfaceEventListener } from './events/types.js';
import { formatMacAddress } from './mac.js';
import { SerialExecutor } from './serial-executor.js';
import { createInterfaceDescriptor, type InterfaceDescriptor, type RadioHandle } from './types.js';

export const DEFAULT_BASE_INTERFACE = 'wlan0';
export const DEFAULT_RESERVED_STATION_NAMES: readonly string[] = ['p2p0'];
export const DEFAULT_RESERVED_STATION_PREFIXES: readonly string[] = ['aware_data', 'softap'];

export interface LifecycleManagerOptions {
  baseInterfaceName?: string;
  /** Names never claimed in station mode (exact match) */
  reservedStationNames?: readonly string[];
  /** Name prefixes never claimed in station mode */
  reservedStationPrefixes?: readonly string[];
}

export interface LifecycleManagerDeps {
  netlink: NetlinkClient;
  interfaceTool: InterfaceTool;
  hostapd: HostapdController;
  supplicant: SupplicantController;
  logger: Logger;
  listeners?: EventListenerRegistry;
}

export type CreateInterfaceError =
  | ConflictError
  | RadioNotFoundError
  | NoUsableInterfaceError
  | KernelError;

interface Snapshot {
  radio: RadioHandle;
  interfaces: readonly InterfaceDescriptor[];
}

/**
 * Owns the station and AP controllers of one radio.
 *
 * Every call-in operation goes through a serial executor, so overlapping calls never
 * interleave. At most one station controller exists at a time.
 */
export class InterfaceLifecycleManager {
  private readonly logger: Logger;
  private readonly listeners: EventListenerRegistry;
  private readonly executor = new SerialExecutor();
  private readonly baseInterfaceName: string;
  private readonly reservedStationNames: readonly string[];
  private readonly reservedStationPrefixes: readonly string[];

  private readonly stationInterfaces = new Map<number, StationInterfaceController>();
  private readonly apInterfaces = new Map<number, AccessPointInterfaceController>();
  private radio: RadioHandle | undefined;
  private interfaces: readonly InterfaceDescriptor[] = [];
  private regDomainSubscription: SubscriptionToken | undefined;

  constructor(
    private readonly deps: LifecycleManagerDeps,
    options: LifecycleManagerOptions = {}
  ) {
    this.logger = deps.logger.child('manager');
    this.listeners = deps.listeners ?? new EventListenerRegistry(deps.logger.child('listeners'));
    this.baseInterfaceName = options.baseInterfaceName ?? DEFAULT_BASE_INTERFACE;
    this.reservedStationNames = options.reservedStationNames ?? DEFAULT_RESERVED_STATION_NAMES;
    this.reservedStationPrefixes =
      options.reservedStationPrefixes ?? DEFAULT_RESERVED_STATION_PREFIXES;
  }

  createStationInterface(): Promise<Result<StationInterfaceController, CreateInterfaceError>> {
    return this.executor.run(async () => {
      if (this.stationInterfaces.size > 0) {
        const error = new ConflictError(
          'Cannot create station interface when other station interfaces exist',
          {
            context: { operation: 'create_station_interface', component: 'manager' },
            data: { existing: this.listStationInterfaces().map(iface => iface.getName()) },
          }
        );
        this.logger.error(error.message, error);
        return failure(error);
      }

      const snapshot = await this.refreshSnapshot('create_station_interface');
      if (!snapshot.success) {
        return snapshot;
      }

      const descriptor = snapshot.data.interfaces.find(
        iface => !this.isReservedForStation(iface.name) && !this.isClaimed(iface.kernelIndex)
      );
      if (!descriptor) {
        return this.reportNoUsableInterface(
          'No usable interface found for station mode',
          'create_station_interface'
        );
      }

      const controller = new StationInterfaceController(snapshot.data.radio, descriptor, {
        interfaceTool: this.deps.interfaceTool,
        supplicant: this.deps.supplicant,
        logger: this.logger,
      });
      this.stationInterfaces.set(descriptor.kernelIndex, controller);
      this.logger.info(`Station interface ${descriptor.name} created`, {
        index: descriptor.kernelIndex,
      });
      this.listeners.broadcast({ kind: 'station-interface-ready', iface: controller });

      return success(controller);
    });
  }

  createAccessPointInterface(): Promise<
    Result<AccessPointInterfaceController, CreateInterfaceError>
  > {
    return this.executor.run(async () => {
      const snapshot = await this.refreshSnapshot('create_ap_interface');
      if (!snapshot.success) {
        return snapshot;
      }

      const descriptor = snapshot.data.interfaces.find(iface => !this.isClaimed(iface.kernelIndex));
      if (!descriptor) {
        return this.reportNoUsableInterface(
          'No usable interface found for AP mode',
          'create_ap_interface'
        );
      }

      return success(this.registerApInterface(descriptor));
    });
  }

  /**
   * Claim the first interface whose name starts with `requestedName`, falling back to a
   * bridge (or other non-radio) interface of exactly that name.
   */
  createNamedAccessPointInterface(
    requestedName: string
  ): Promise<Result<AccessPointInterfaceController, CreateInterfaceError>> {
    return this.executor.run(async () => {
      if (requestedName.length === 0) {
        return this.reportNoUsableInterface(
          'Requested interface name is empty',
          'create_named_ap_interface'
        );
      }

      const snapshot = await this.refreshSnapshot('create_named_ap_interface');
      if (!snapshot.success) {
        return snapshot;
      }

      const descriptor =
        snapshot.data.interfaces.find(iface => iface.name.startsWith(requestedName)) ??
        (await this.resolveBridgeInterface(requestedName));

      if (!descriptor) {
        return this.reportNoUsableInterface(
          `No usable interface found with name ${requestedName}`,
          'create_named_ap_interface'
        );
      }

      if (this.isClaimed(descriptor.kernelIndex)) {
        const error = new ConflictError(
          `Interface ${descriptor.name} is already claimed by another controller`,
          {
            context: { operation: 'create_named_ap_interface', component: 'manager' },
            data: { interface: descriptor.name, index: descriptor.kernelIndex },
          }
        );
        this.logger.error(error.message, error);
        return failure(error);
      }

      return success(this.registerApInterface(descriptor));
    });
  }

  tearDownStationInterfaces(): Promise<void> {
    return this.executor.run(() => this.releaseStationInterfaces());
  }

  tearDownApInterfaces(): Promise<void> {
    return this.executor.run(() => this.releaseApInterfaces());
  }

  /**
   * Release every controller, mark every radio interface down and drop the
   * regulatory-domain subscription. Never fails; problems are logged.
   */
  tearDownAll(): Promise<void> {
    return this.executor.run(async () => {
      await this.releaseStationInterfaces();
      await this.releaseApInterfaces();
      await this.markDownAllInterfaces();

      const subscription = this.regDomainSubscription;
      this.regDomainSubscription = undefined;
      if (subscription) {
        const result = await safeAsync(() => this.deps.netlink.unsubscribe(subscription));
        if (!result.success) {
          this.logger.error('Failed to unsubscribe regulatory domain change', result.error);
        }
      }

      this.logger.info('All interfaces torn down');
    });
  }

  /**
   * Bring the host to a known state before any interface is created: stop the supplicant,
   * stop hostapd in both modes and set every radio interface down.
   */
  cleanUpSystemState(): Promise<void> {
    return this.executor.run(async () => {
      const steps: Array<[string, () => Promise<boolean>]> = [
        ['stop supplicant', () => this.deps.supplicant.stop()],
        ['stop hostapd', () => this.deps.hostapd.stop(false)],
        ['stop dual hostapd', () => this.deps.hostapd.stop(true)],
      ];

      for (const [description, step] of steps) {
        const result = await safeAsync(step);
        if (!result.success || !result.data) {
          this.logger.warn(`Failed to ${description} during cleanup`, {
            ...(result.error && { error: result.error.message }),
          });
        }
      }

      await this.markDownAllInterfaces();
    });
  }

  /**
   * Log the new country and the bands the radio now supports. Nothing is retained.
   */
  async onRegulatoryDomainChanged(countryCode: string): Promise<void> {
    this.logger.info(`Regulatory domain changed to country: ${countryCode || 'unknown'}`);

    const radio = this.radio;
    if (radio === undefined) {
      this.logger.warn('No radio resolved, skipping supported band query');
      return;
    }

    const bands = await safeAsync(() => this.deps.netlink.getSupportedBands(radio));
    if (!bands.success) {
      this.logger.error('Failed to get supported bands after regulatory domain change', bands.error);
      return;
    }

    const { band2g, band5g, bandDfs } = bands.data;
    this.logger.info(`2.4Ghz frequencies: ${band2g.join(' ')}`);
    this.logger.info(`5Ghz non-DFS frequencies: ${band5g.join(' ')}`);
    this.logger.info(`5Ghz DFS frequencies: ${bandDfs.join(' ')}`);
  }

  listStationInterfaces(): StationInterfaceController[] {
    return Array.from(this.stationInterfaces.values());
  }

  listApInterfaces(): AccessPointInterfaceController[] {
    return Array.from(this.apInterfaces.values());
  }

  registerListener(listener: InterfaceEventListener): boolean {
    return this.listeners.register(listener);
  }

  unregisterListener(listener: InterfaceEventListener): boolean {
    return this.listeners.unregister(listener);
  }

  getRadio(): RadioHandle | undefined {
    return this.radio;
  }

  getCachedInterfaces(): readonly InterfaceDescriptor[] {
    return this.interfaces;
  }

  dump(): string {
    const lines = [
      `Current wiphy index: ${this.radio ?? 'unknown'}`,
      'Cached interfaces list from kernel message:',
      ...this.interfaces.map(
        iface =>
          `Interface index: ${iface.kernelIndex}, name: ${iface.name}, mac address: ${formatMacAddress(iface.macAddress)}`
      ),
      ...this.listStationInterfaces().map(controller => controller.dump()),
      ...this.listApInterfaces().map(controller => controller.dump()),
    ];
    return lines.join('\n');
  }

  private registerApInterface(descriptor: InterfaceDescriptor): AccessPointInterfaceController {
    const controller = new AccessPointInterfaceController(descriptor, {
      netlink: this.deps.netlink,
      interfaceTool: this.deps.interfaceTool,
      hostapd: this.deps.hostapd,
      listeners: this.listeners,
      logger: this.logger,
    });
    this.apInterfaces.set(descriptor.kernelIndex, controller);
    this.logger.info(`AP interface ${descriptor.name} created`, { index: descriptor.kernelIndex });
    this.listeners.broadcast({ kind: 'ap-interface-ready', iface: controller });
    return controller;
  }

  private async releaseStationInterfaces(): Promise<void> {
    for (const [index, controller] of [...this.stationInterfaces]) {
      this.listeners.broadcast({ kind: 'station-interface-torn-down', iface: controller });
      await this.releaseController(controller);
      this.stationInterfaces.delete(index);
    }
  }

  private async releaseApInterfaces(): Promise<void> {
    for (const [index, controller] of [...this.apInterfaces]) {
      this.listeners.broadcast({ kind: 'ap-interface-torn-down', iface: controller });
      await this.releaseController(controller);
      this.apInterfaces.delete(index);
    }
  }

  private async releaseController(
    controller: StationInterfaceController | AccessPointInterfaceController
  ): Promise<void> {
    const result = await safeAsync(() => controller.release());
    if (!result.success) {
      this.logger.error(`Failed to release interface ${controller.getName()}`, result.error);
    }
  }

  /**
   * Set every interface the radio reports down. Works on a local snapshot: the cached
   * list and the regulatory-domain subscription are left alone.
   */
  private async markDownAllInterfaces(): Promise<void> {
    const operation = 'mark_down_all_interfaces';
    const radio = await this.resolveRadio(operation);
    if (!radio.success) {
      return;
    }
    const interfaces = await this.enumerateInterfaces(radio.data, operation);
    if (!interfaces.success) {
      return;
    }

    for (const iface of interfaces.data) {
      const result = await safeAsync(() => this.deps.interfaceTool.setUpState(iface.name, false));
      if (!result.success || !result.data) {
        this.logger.warn(`Failed to set interface ${iface.name} down`, {
          ...(result.error && { error: result.error.message }),
        });
      }
    }
  }

  /**
   * Re-resolve the radio, (re)subscribe to its regulatory-domain changes and cache a
   * fresh interface list
   */
  private async refreshSnapshot(
    operation: string
  ): Promise<Result<Snapshot, RadioNotFoundError | KernelError>> {
    const resolved = await this.resolveRadio(operation);
    if (!resolved.success) {
      return resolved;
    }

    const radio = resolved.data;
    this.radio = radio;
    await this.subscribeRegDomainChange(radio);

    this.interfaces = [];
    const enumerated = await this.enumerateInterfaces(radio, operation);
    if (!enumerated.success) {
      return enumerated;
    }

    this.interfaces = enumerated.data;
    return success({ radio, interfaces: this.interfaces });
  }

  private async resolveRadio(operation: string): Promise<Result<RadioHandle, RadioNotFoundError>> {
    const resolved = await safeAsync(() => this.deps.netlink.resolveRadio(this.baseInterfaceName));
    if (!resolved.success || resolved.data === undefined) {
      const error = new RadioNotFoundError(
        `Failed to get wiphy index for ${this.baseInterfaceName}`,
        {
          ...(resolved.error && { cause: resolved.error }),
          context: { operation, component: 'manager' },
          data: { baseInterface: this.baseInterfaceName },
        }
      );
      this.logger.error(error.message, error);
      return failure(error);
    }
    return success(resolved.data);
  }

  private async enumerateInterfaces(
    radio: RadioHandle,
    operation: string
  ): Promise<Result<InterfaceDescriptor[], KernelError>> {
    const enumerated = await safeAsync(() => this.deps.netlink.enumerateInterfaces(radio));
    if (!enumerated.success) {
      const error = new KernelError('Failed to get interfaces info from kernel', {
        cause: enumerated.error,
        context: { operation, component: 'manager' },
        data: { radio },
      });
      this.logger.error(error.message, error);
      return failure(error);
    }
    return success(
      enumerated.data.map(iface =>
        createInterfaceDescriptor(iface.name, iface.kernelIndex, iface.macAddress)
      )
    );
  }

  private async subscribeRegDomainChange(radio: RadioHandle): Promise<void> {
    const previous = this.regDomainSubscription;
    this.regDomainSubscription = this.deps.netlink.subscribeRegDomainChange(radio, event =>
      this.onRegulatoryDomainChanged(event.countryCode)
    );

    // Same-radio subscriptions are replaced by the event source itself
    if (previous && previous.key !== radio) {
      const result = await safeAsync(() => this.deps.netlink.unsubscribe(previous));
      if (!result.success) {
        this.logger.warn('Failed to unsubscribe previous regulatory domain change', {
          error: result.error.message,
        });
      }
    }
  }

  private isReservedForStation(name: string): boolean {
    return (
      this.reservedStationNames.includes(name) ||
      this.reservedStationPrefixes.some(prefix => name.startsWith(prefix))
    );
  }

  private isClaimed(kernelIndex: number): boolean {
    return this.stationInterfaces.has(kernelIndex) || this.apInterfaces.has(kernelIndex);
  }

  private reportNoUsableInterface(
    message: string,
    operation: string
  ): Result<never, NoUsableInterfaceError> {
    const error = new NoUsableInterfaceError(message, {
      context: { operation, component: 'manager' },
      data: { candidates: this.interfaces.map(iface => iface.name) },
    });
    this.logger.error(error.message, error);
    return failure(error);
  }

  private async resolveBridgeInterface(name: string): Promise<InterfaceDescriptor | undefined> {
    const index = await safeAsync(() => this.deps.interfaceTool.nameToIndex(name));
    if (!index.success || index.data === undefined) {
      this.logger.error(`Failed to get requested interface ${name}`, index.error);
      return undefined;
    }

    const address = await safeAsync(() => this.deps.interfaceTool.getHardwareAddress(name));
    if (!address.success) {
      this.logger.error(`Failed to get hardware address of ${name}`, address.error);
      return undefined;
    }

    this.logger.info(`Bridged interface found: ${name}`, { index: index.data });
    return createInterfaceDescriptor(name, index.data, address.data);
  }
}
