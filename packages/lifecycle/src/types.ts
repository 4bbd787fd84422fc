/**
 * Core data model for radios, interfaces and kernel events
 */

// Branded wiphy index
export type RadioHandle = number & { readonly __brand: 'RadioHandle' };

export function isRadioHandle(value: number): value is RadioHandle {
  return Number.isInteger(value) && value >= 0;
}

export function createRadioHandle(index: number): RadioHandle {
  if (!isRadioHandle(index)) {
    throw new Error(`Invalid radio index: ${index}. Must be a non-negative integer.`);
  }
  return index;
}

/** Six-byte hardware address */
export type MacAddress = readonly number[];

export interface InterfaceDescriptor {
  readonly name: string;
  readonly kernelIndex: number;
  readonly macAddress: MacAddress;
}

export function createInterfaceDescriptor(
  name: string,
  kernelIndex: number,
  macAddress: Iterable<number>
): InterfaceDescriptor {
  return Object.freeze({
    name,
    kernelIndex,
    macAddress: Object.freeze([...macAddress]),
  });
}

export enum InterfaceMode {
  STATION = 'station',
  AP = 'ap',
}

export enum StationEventKind {
  JOINED = 'joined',
  LEFT = 'left',
}

export interface StationEvent {
  readonly interfaceIndex: number;
  readonly kind: StationEventKind;
  readonly macAddress: MacAddress;
}

export interface RegDomainChangeEvent {
  readonly radio: RadioHandle;
  /** Empty when the kernel did not report a country */
  readonly countryCode: string;
}

/** Frequencies in MHz */
export interface BandInfo {
  readonly band2g: readonly number[];
  readonly band5g: readonly number[];
  readonly bandDfs: readonly number[];
}

export enum EncryptionType {
  OPEN = 'open',
  WPA = 'wpa',
  WPA2 = 'wpa2',
}

/**
 * Soft AP parameters handed to hostapd configuration generation
 */
export interface ApDaemonSettings {
  readonly ssid: Uint8Array;
  readonly hidden: boolean;
  readonly channel: number;
  readonly encryption: EncryptionType;
  readonly passphrase: Uint8Array;
}
