import type { Logger } from '@wlanctl/logging';

import type { InterfaceEvent, InterfaceEventListener } from './types.js';

/**
 * Ordered, identity-deduplicated set of interface event listeners
 */
export class EventListenerRegistry {
  private readonly listeners: InterfaceEventListener[] = [];

  constructor(private readonly logger: Logger) {}

  /**
   * Returns false when the listener was already registered
   */
  register(listener: InterfaceEventListener): boolean {
    if (this.listeners.includes(listener)) {
      this.logger.warn('Ignoring duplicate registration of interface event listener');
      return false;
    }

    this.listeners.push(listener);
    return true;
  }

  unregister(listener: InterfaceEventListener): boolean {
    const index = this.listeners.indexOf(listener);
    if (index === -1) {
      this.logger.warn('Ignoring removal of unregistered interface event listener');
      return false;
    }

    this.listeners.splice(index, 1);
    return true;
  }

  /**
   * Notify every listener in registration order. A throwing listener is logged and
   * skipped; the rest are still notified.
   *
   * @returns number of listeners that threw
   */
  broadcast(event: InterfaceEvent): number {
    let failures = 0;

    // Snapshot so listeners may (un)register from inside a callback
    for (const listener of [...this.listeners]) {
      try {
        listener.onInterfaceEvent(event);
      } catch (error) {
        failures++;
        this.logger.error(`Interface event listener failed on ${event.kind}`, error, {
          interface: event.iface.getName(),
        });
      }
    }

    return failures;
  }

  has(listener: InterfaceEventListener): boolean {
    return this.listeners.includes(listener);
  }

  size(): number {
    return this.listeners.length;
  }
}
