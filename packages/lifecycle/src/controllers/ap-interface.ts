import {
  AnomalyWarning,
  ConfigGenerationError,
  ConflictError,
  DaemonStartError,
  DaemonStopError,
  ModeResetError,
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
} from '../collaborators.js';
import type { EventListenerRegistry } from '../events/registry.js';
import { formatMacAddress } from '../mac.js';
import {
  InterfaceMode,
  StationEventKind,
  type ApDaemonSettings,
  type InterfaceDescriptor,
  type MacAddress,
} from '../types.js';

export enum ApInterfaceState {
  CREATED = 'created',
  RUNNING = 'running',
  STOPPED = 'stopped',
  RELEASED = 'released',
}

export interface AccessPointControllerDeps {
  netlink: NetlinkClient;
  interfaceTool: InterfaceTool;
  hostapd: HostapdController;
  listeners: EventListenerRegistry;
  logger: Logger;
}

interface StepOutcome {
  ok: boolean;
  error?: Error;
}

/**
 * One interface claimed in AP mode. Owns hostapd for it and counts associated stations.
 *
 * Subscribes to the interface's station events on construction; `release()` ends the
 * subscription before touching the daemon or the interface.
 */
export class AccessPointInterfaceController {
  readonly mode = InterfaceMode.AP;

  private state = ApInterfaceState.CREATED;
  private associatedStations = 0;
  private runningDual = false;
  private readonly subscription: SubscriptionToken;
  private releasing: Promise<void> | undefined;
  private readonly logger: Logger;

  constructor(
    readonly descriptor: InterfaceDescriptor,
    private readonly deps: AccessPointControllerDeps
  ) {
    this.logger = deps.logger.child(`ap:${descriptor.name}`);
    this.subscription = deps.netlink.subscribeStationEvents(descriptor.kernelIndex, event =>
      this.onStationEvent(event.kind, event.macAddress)
    );
    this.logger.debug('AP interface created', { index: descriptor.kernelIndex });
  }

  getName(): string {
    return this.descriptor.name;
  }

  getInterfaceIndex(): number {
    return this.descriptor.kernelIndex;
  }

  getState(): ApInterfaceState {
    return this.state;
  }

  isReleased(): boolean {
    return this.releasing !== undefined;
  }

  getAssociatedStationCount(): number {
    return this.associatedStations;
  }

  async writeDaemonConfig(
    settings: ApDaemonSettings,
    dual = false
  ): Promise<Result<void, ConfigGenerationError>> {
    const config = this.deps.hostapd.buildConfig(this.getName(), settings);
    if (config.length === 0) {
      const error = new ConfigGenerationError('Failed to construct hostapd config', {
        context: { operation: 'write_daemon_config', component: 'ap-interface' },
        data: { interface: this.getName() },
      });
      this.logger.error(error.message, error);
      return failure(error);
    }

    const written = await this.attempt(() => this.deps.hostapd.writeConfig(config, dual));
    if (!written.ok) {
      const error = new ConfigGenerationError('Failed to write hostapd config', {
        ...(written.error && { cause: written.error }),
        context: { operation: 'write_daemon_config', component: 'ap-interface' },
        data: { interface: this.getName(), dual },
      });
      this.logger.error(error.message, error);
      return failure(error);
    }

    return success(undefined);
  }

  async startDaemon(dual = false): Promise<Result<void, DaemonStartError | ConflictError>> {
    if (this.isReleased()) {
      return failure(
        new ConflictError(`AP interface ${this.getName()} has been released`, {
          context: { operation: 'start_daemon', component: 'ap-interface' },
        })
      );
    }

    if (this.state === ApInterfaceState.RUNNING) {
      this.logger.debug('hostapd already running');
      return success(undefined);
    }

    const started = await this.attempt(() => this.deps.hostapd.start(dual));
    if (!started.ok) {
      const error = new DaemonStartError('Failed to start hostapd', {
        ...(started.error && { cause: started.error }),
        context: { operation: 'start_daemon', component: 'ap-interface' },
        data: { interface: this.getName(), dual },
      });
      this.logger.error(error.message, error);
      return failure(error);
    }

    this.state = ApInterfaceState.RUNNING;
    this.runningDual = dual;
    this.logger.info('hostapd started', { dual });
    return success(undefined);
  }

  /**
   * Stop hostapd, set the interface down and reset it to station mode.
   * All three steps always run; a failed mode reset is reported ahead of a failed stop.
   */
  async stopDaemon(dual = false): Promise<Result<void, ModeResetError | DaemonStopError>> {
    const stopped = await this.attempt(() => this.deps.hostapd.stop(dual));
    if (!stopped.ok) {
      this.logger.error('Failed to stop hostapd', stopped.error);
    }

    const down = await this.attempt(() => this.deps.interfaceTool.setUpState(this.getName(), false));
    if (!down.ok) {
      this.logger.warn('Failed to set interface down', {
        ...(down.error && { error: down.error.message }),
      });
    }

    const reset = await this.attempt(() =>
      this.deps.netlink.setInterfaceMode(this.getInterfaceIndex(), InterfaceMode.STATION)
    );

    if (this.state !== ApInterfaceState.RELEASED) {
      this.state = ApInterfaceState.STOPPED;
    }

    if (!reset.ok) {
      const error = new ModeResetError('Failed to set interface back to station mode', {
        ...(reset.error && { cause: reset.error }),
        context: { operation: 'stop_daemon', component: 'ap-interface' },
        data: { interface: this.getName(), daemonStopped: stopped.ok },
      });
      this.logger.error(error.message, error);
      return failure(error);
    }

    if (!stopped.ok) {
      return failure(
        new DaemonStopError('Failed to stop hostapd', {
          ...(stopped.error && { cause: stopped.error }),
          context: { operation: 'stop_daemon', component: 'ap-interface' },
          data: { interface: this.getName(), dual },
        })
      );
    }

    return success(undefined);
  }

  onStationEvent(kind: StationEventKind, macAddress: MacAddress): void {
    if (this.isReleased()) {
      this.logger.debug('Dropping station event for released interface', { kind });
      return;
    }

    const mac = formatMacAddress(macAddress);

    if (kind === StationEventKind.JOINED) {
      this.associatedStations++;
      this.logger.info(`New station ${mac} connected to hotspot using interface ${this.getName()}`, {
        associatedStations: this.associatedStations,
      });
      this.deps.listeners.broadcast({ kind: 'softap-client', iface: this, macAddress, connected: true });
      return;
    }

    if (this.associatedStations === 0) {
      const warning = new AnomalyWarning('Received station left event when station count is 0', {
        context: { operation: 'station_event', component: 'ap-interface' },
        data: { interface: this.getName(), mac },
      });
      this.logger.warn(warning.message, warning.toLogFormat());
      return;
    }

    this.associatedStations--;
    this.logger.info(`Station ${mac} disassociated from hotspot`, {
      associatedStations: this.associatedStations,
    });
    this.deps.listeners.broadcast({ kind: 'softap-client', iface: this, macAddress, connected: false });
  }

  /**
   * End the station event subscription, stop hostapd if running and set the interface down.
   * Safe to call repeatedly.
   */
  release(): Promise<void> {
    this.releasing ??= this.performRelease();
    return this.releasing;
  }

  dump(): string {
    return [
      'AP interface:',
      `  Interface index: ${this.descriptor.kernelIndex}`,
      `  Interface name: ${this.descriptor.name}`,
      `  Interface mac address: ${formatMacAddress(this.descriptor.macAddress)}`,
      `  State: ${this.state}`,
      `  Number of associated stations: ${this.associatedStations}`,
    ].join('\n');
  }

  private async performRelease(): Promise<void> {
    await this.deps.netlink.unsubscribe(this.subscription);

    if (this.state === ApInterfaceState.RUNNING) {
      // stopDaemon also sets the interface down
      const stopped = await this.stopDaemon(this.runningDual);
      if (!stopped.success) {
        this.logger.error('Failed to stop AP while releasing', stopped.error);
      }
    } else {
      const down = await this.attempt(() =>
        this.deps.interfaceTool.setUpState(this.getName(), false)
      );
      if (!down.ok) {
        this.logger.warn('Failed to set interface down', {
          ...(down.error && { error: down.error.message }),
        });
      }
    }

    this.state = ApInterfaceState.RELEASED;
    this.logger.debug('AP interface released');
  }

  private async attempt(step: () => Promise<boolean>): Promise<StepOutcome> {
    const result = await safeAsync(step);
    if (!result.success) {
      return { ok: false, error: result.error };
    }
    return { ok: result.data };
  }
}
