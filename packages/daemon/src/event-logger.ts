import { formatMacAddress, type InterfaceEvent, type InterfaceEventListener } from '@wlanctl/lifecycle';
import type { Logger } from '@wlanctl/logging';

/**
 * Writes every interface lifecycle and soft-AP client event to the log
 */
export class LoggingEventListener implements InterfaceEventListener {
  constructor(private readonly logger: Logger) {}

  onInterfaceEvent(event: InterfaceEvent): void {
    if (event.kind === 'softap-client') {
      this.logger.info(
        `SoftAP client ${formatMacAddress(event.macAddress)} ${event.connected ? 'connected' : 'disconnected'}`,
        {
          interface: event.iface.getName(),
          associatedStations: event.iface.getAssociatedStationCount(),
        }
      );
      return;
    }

    this.logger.info(`${event.kind}: ${event.iface.getName()}`, {
      index: event.iface.getInterfaceIndex(),
    });
  }
}
