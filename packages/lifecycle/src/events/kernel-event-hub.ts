import type { Logger } from '@wlanctl/logging';

import type {
  KernelEventSource,
  RegDomainChangeHandler,
  StationEventHandler,
  SubscriptionToken,
} from '../collaborators.js';
import { formatMacAddress } from '../mac.js';
import type { MacAddress, RadioHandle, StationEventKind } from '../types.js';

interface Subscription {
  readonly token: SubscriptionToken;
  active: boolean;
  readonly inFlight: Set<Promise<void>>;
}

interface QueuedDelivery {
  readonly subscription: Subscription;
  readonly description: string;
  readonly deliver: () => void | Promise<void>;
}

/**
 * In-process channel carrying kernel station and regulatory-domain events to subscribers.
 *
 * Publishing only enqueues; handlers run on a later macrotask. Once `unsubscribe(token)`
 * resolves, no handler for that token is running and none will run again.
 */
export class KernelEventHub implements KernelEventSource {
  private nextId = 1;
  private readonly subscriptions = new Map<number, Subscription>();
  private readonly stationHandlers = new Map<number, { id: number; handler: StationEventHandler }>();
  private readonly regDomainHandlers = new Map<
    RadioHandle,
    { id: number; handler: RegDomainChangeHandler }
  >();
  private readonly pending = new Set<Promise<void>>();
  private queue: QueuedDelivery[] = [];
  private drainScheduled = false;

  constructor(private readonly logger: Logger) {}

  subscribeStationEvents(interfaceIndex: number, handler: StationEventHandler): SubscriptionToken {
    const previous = this.stationHandlers.get(interfaceIndex);
    if (previous) {
      this.logger.warn('Replacing station event subscription', { interfaceIndex });
      this.deactivate(previous.id);
    }

    const subscription = this.createSubscription('station', interfaceIndex);
    this.stationHandlers.set(interfaceIndex, { id: subscription.token.id, handler });
    return subscription.token;
  }

  subscribeRegDomainChange(radio: RadioHandle, handler: RegDomainChangeHandler): SubscriptionToken {
    const previous = this.regDomainHandlers.get(radio);
    if (previous) {
      this.deactivate(previous.id);
    }

    const subscription = this.createSubscription('reg-domain', radio);
    this.regDomainHandlers.set(radio, { id: subscription.token.id, handler });
    return subscription.token;
  }

  async unsubscribe(token: SubscriptionToken): Promise<void> {
    const subscription = this.deactivate(token.id);
    if (!subscription) {
      this.logger.debug('Unsubscribe for inactive token', { ...token });
      return;
    }

    await Promise.all(subscription.inFlight);
  }

  /**
   * Queue a station event for the subscriber of `interfaceIndex`.
   * Returns false when nobody is subscribed.
   */
  publishStationEvent(interfaceIndex: number, kind: StationEventKind, macAddress: MacAddress): boolean {
    const entry = this.stationHandlers.get(interfaceIndex);
    const subscription = entry && this.subscriptions.get(entry.id);
    if (!entry || !subscription) {
      this.logger.debug('No subscriber for station event', { interfaceIndex, kind });
      return false;
    }

    this.enqueue({
      subscription,
      description: `station ${kind} ${formatMacAddress(macAddress)} on ${interfaceIndex}`,
      deliver: () => entry.handler({ interfaceIndex, kind, macAddress }),
    });
    return true;
  }

  publishRegDomainChange(radio: RadioHandle, countryCode: string): boolean {
    const entry = this.regDomainHandlers.get(radio);
    const subscription = entry && this.subscriptions.get(entry.id);
    if (!entry || !subscription) {
      this.logger.debug('No subscriber for regulatory domain change', { radio, countryCode });
      return false;
    }

    this.enqueue({
      subscription,
      description: `reg-domain ${countryCode || 'unknown'} on radio ${radio}`,
      deliver: () => entry.handler({ radio, countryCode }),
    });
    return true;
  }

  /**
   * Resolve once every queued event has been delivered and every handler has settled
   */
  async flush(): Promise<void> {
    while (this.queue.length > 0 || this.drainScheduled || this.pending.size > 0) {
      await new Promise<void>(resolve => setImmediate(resolve));
      await Promise.all(this.pending);
    }
  }

  /** Radios that currently have a regulatory-domain subscriber */
  getRegDomainRadios(): RadioHandle[] {
    return Array.from(this.regDomainHandlers.keys());
  }

  getActiveSubscriptionCount(): number {
    return this.subscriptions.size;
  }

  private createSubscription(topic: SubscriptionToken['topic'], key: number): Subscription {
    const token: SubscriptionToken = Object.freeze({ id: this.nextId++, topic, key });
    const subscription: Subscription = { token, active: true, inFlight: new Set() };
    this.subscriptions.set(token.id, subscription);
    return subscription;
  }

  private deactivate(id: number): Subscription | undefined {
    const subscription = this.subscriptions.get(id);
    if (!subscription) {
      return undefined;
    }

    subscription.active = false;
    this.subscriptions.delete(id);

    const { topic, key } = subscription.token;
    if (topic === 'station' && this.stationHandlers.get(key)?.id === id) {
      this.stationHandlers.delete(key);
    }
    if (topic === 'reg-domain') {
      for (const [radio, entry] of this.regDomainHandlers) {
        if (entry.id === id) {
          this.regDomainHandlers.delete(radio);
        }
      }
    }

    const before = this.queue.length;
    this.queue = this.queue.filter(item => item.subscription !== subscription);
    const dropped = before - this.queue.length;
    if (dropped > 0) {
      this.logger.debug('Dropped queued events for released subscription', { id, dropped });
    }

    return subscription;
  }

  private enqueue(delivery: QueuedDelivery): void {
    this.queue.push(delivery);
    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  private drain(): void {
    this.drainScheduled = false;
    const batch = this.queue;
    this.queue = [];

    for (const delivery of batch) {
      if (delivery.subscription.active) {
        this.dispatch(delivery);
      }
    }
  }

  private dispatch({ subscription, description, deliver }: QueuedDelivery): void {
    let outcome: void | Promise<void>;
    try {
      outcome = deliver();
    } catch (error) {
      this.logger.error(`Event handler failed: ${description}`, error);
      return;
    }

    if (outcome instanceof Promise) {
      const settled: Promise<void> = outcome
        .catch((error: unknown) => {
          this.logger.error(`Event handler failed: ${description}`, error);
        })
        .finally(() => {
          subscription.inFlight.delete(settled);
          this.pending.delete(settled);
        });
      subscription.inFlight.add(settled);
      this.pending.add(settled);
    }
  }
}
