/**
 * Contracts of the kernel and daemon collaborators the lifecycle core calls into
 */

import type {
  ApDaemonSettings,
  BandInfo,
  InterfaceDescriptor,
  InterfaceMode,
  MacAddress,
  RadioHandle,
  RegDomainChangeEvent,
  StationEvent,
} from './types.js';

/**
 * Opaque subscription handle. Pass it back to `unsubscribe`.
 */
export interface SubscriptionToken {
  readonly id: number;
  readonly topic: 'station' | 'reg-domain';
  /** Interface index for station subscriptions, radio for reg-domain ones */
  readonly key: number;
}

export type StationEventHandler = (event: StationEvent) => void | Promise<void>;
export type RegDomainChangeHandler = (event: RegDomainChangeEvent) => void | Promise<void>;

export interface KernelEventSource {
  subscribeStationEvents(interfaceIndex: number, handler: StationEventHandler): SubscriptionToken;
  /** Replaces any earlier subscription for the same radio */
  subscribeRegDomainChange(radio: RadioHandle, handler: RegDomainChangeHandler): SubscriptionToken;
  /** Resolves once no further callback for the token can run */
  unsubscribe(token: SubscriptionToken): Promise<void>;
}

export interface NetlinkClient extends KernelEventSource {
  /** Wiphy index of the radio hosting `interfaceName` */
  resolveRadio(interfaceName: string): Promise<RadioHandle | undefined>;
  /** Rejects when the kernel cannot be queried */
  enumerateInterfaces(radio: RadioHandle): Promise<InterfaceDescriptor[]>;
  setInterfaceMode(interfaceIndex: number, mode: InterfaceMode): Promise<boolean>;
  getSupportedBands(radio: RadioHandle): Promise<BandInfo>;
}

export interface InterfaceTool {
  setUpState(interfaceName: string, up: boolean): Promise<boolean>;
  nameToIndex(interfaceName: string): Promise<number | undefined>;
  getHardwareAddress(interfaceName: string): Promise<MacAddress>;
}

export interface HostapdController {
  /** Returns an empty string when the settings cannot be serialized */
  buildConfig(interfaceName: string, settings: ApDaemonSettings): string;
  writeConfig(config: string, dual: boolean): Promise<boolean>;
  start(dual: boolean): Promise<boolean>;
  stop(dual: boolean): Promise<boolean>;
}

export interface SupplicantController {
  start(): Promise<boolean>;
  stop(): Promise<boolean>;
}

/**
 * Vendor soft-AP tool used by the raw command protocol
 */
export interface VendorTool {
  exec(args: readonly string[]): Promise<boolean>;
  addOrRemoveInterface(interfaceName: string, add: boolean): Promise<boolean>;
  controlBridge(args: readonly string[]): Promise<boolean>;
  setSoftap(args: readonly string[]): Promise<boolean>;
}
