import type { AccessPointInterfaceController } from '../controllers/ap-interface.js';
import type { StationInterfaceController } from '../controllers/station-interface.js';
import type { MacAddress } from '../types.js';

export type InterfaceEvent =
  | { readonly kind: 'station-interface-ready'; readonly iface: StationInterfaceController }
  | { readonly kind: 'ap-interface-ready'; readonly iface: AccessPointInterfaceController }
  | { readonly kind: 'station-interface-torn-down'; readonly iface: StationInterfaceController }
  | { readonly kind: 'ap-interface-torn-down'; readonly iface: AccessPointInterfaceController }
  | {
      readonly kind: 'softap-client';
      readonly iface: AccessPointInterfaceController;
      readonly macAddress: MacAddress;
      readonly connected: boolean;
    };

export type InterfaceEventKind = InterfaceEvent['kind'];

export interface InterfaceEventListener {
  onInterfaceEvent(event: InterfaceEvent): void;
}
