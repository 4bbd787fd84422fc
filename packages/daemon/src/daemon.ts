import { failure, success, type Result, type WlanError } from '@wlanctl/errors';
import {
  CommandDispatcher,
  InterfaceLifecycleManager,
  type HostapdController,
  type InterfaceTool,
  type NetlinkClient,
  type SupplicantController,
  type VendorTool,
} from '@wlanctl/lifecycle';
import { LoggerFactory, type Logger } from '@wlanctl/logging';
import {
  CommandLineVendorTool,
  HostapdManager,
  SupplicantManager,
  SystemInterfaceTool,
  SystemNetlinkClient,
} from '@wlanctl/system';

import { toApDaemonSettings, type WlanctlConfig } from './config.js';
import { LoggingEventListener } from './event-logger.js';

/**
 * Everything the daemon drives on the host
 */
export interface DaemonBackend {
  netlink: NetlinkClient;
  interfaceTool: InterfaceTool;
  hostapd: HostapdController;
  supplicant: SupplicantController;
  vendorTool: VendorTool;
  /** Begin delivering kernel events */
  startEventMonitor?(): void;
  close?(): Promise<void>;
}

export function createSystemBackend(config: WlanctlConfig, logger: Logger): DaemonBackend {
  const netlink = new SystemNetlinkClient({ logger, iwBinary: config.tools.iw });

  return {
    netlink,
    interfaceTool: new SystemInterfaceTool({ logger, ipBinary: config.tools.ip }),
    hostapd: new HostapdManager({
      binary: config.hostapd.binary,
      args: config.hostapd.args,
      configPath: config.hostapd.config_path,
      dualConfigPath: config.hostapd.dual_config_path,
      controlInterface: config.hostapd.ctrl_interface,
      logger,
    }),
    supplicant: new SupplicantManager({
      binary: config.supplicant.binary,
      args: config.supplicant.args,
      logger,
    }),
    vendorTool: new CommandLineVendorTool({
      enabled: config.vendor_tool.enabled,
      path: config.vendor_tool.path,
      logger,
    }),
    startEventMonitor: () => netlink.startEventMonitor(),
    close: () => netlink.close(),
  };
}

export function createDaemonLogger(config: WlanctlConfig['logging'], component = 'wlanctl'): Logger {
  return LoggerFactory.createFromOptions(component, {
    level: config.level,
    file: config.file,
    format: config.format,
    maxSize: config.max_size,
    maxFiles: config.backup_count,
  });
}

/**
 * Composition root: wires the lifecycle manager and command dispatcher to a backend and
 * brings the host into its configured startup state.
 */
export class WlanDaemon {
  readonly manager: InterfaceLifecycleManager;
  readonly dispatcher: CommandDispatcher;
  private readonly eventLogger: LoggingEventListener;
  private readonly logger: Logger;
  private started = false;

  constructor(
    private readonly config: WlanctlConfig,
    logger: Logger,
    private readonly backend: DaemonBackend = createSystemBackend(config, logger)
  ) {
    this.logger = logger.child('daemon');
    this.manager = new InterfaceLifecycleManager(
      { ...backend, logger },
      {
        baseInterfaceName: config.radio.base_interface,
        reservedStationNames: config.radio.reserved_station_names,
        reservedStationPrefixes: config.radio.reserved_station_prefixes,
      }
    );
    this.dispatcher = new CommandDispatcher(this.manager, backend.vendorTool, logger, {
      maxTokens: config.commands.max_tokens,
    });
    this.eventLogger = new LoggingEventListener(logger.child('events'));
  }

  isStarted(): boolean {
    return this.started;
  }

  async start(): Promise<Result<void, WlanError>> {
    if (this.started) {
      return success(undefined);
    }

    this.manager.registerListener(this.eventLogger);
    this.backend.startEventMonitor?.();
    await this.manager.cleanUpSystemState();
    this.started = true;

    const { startup } = this.config;

    if (startup.station) {
      const station = await this.manager.createStationInterface();
      if (!station.success) {
        return failure(station.error);
      }
      if (startup.enable_supplicant) {
        const enabled = await station.data.enableSupplicant();
        if (!enabled.success) {
          return failure(enabled.error);
        }
      }
    }

    if (startup.access_point) {
      const ap = await this.manager.createAccessPointInterface();
      if (!ap.success) {
        return failure(ap.error);
      }
      const written = await ap.data.writeDaemonConfig(toApDaemonSettings(startup.access_point));
      if (!written.success) {
        return failure(written.error);
      }
      const started = await ap.data.startDaemon();
      if (!started.success) {
        return failure(started.error);
      }
    }

    this.logger.info('wlanctl daemon started', {
      baseInterface: this.config.radio.base_interface,
      stations: this.manager.listStationInterfaces().length,
      accessPoints: this.manager.listApInterfaces().length,
    });
    return success(undefined);
  }

  /**
   * Run one vendor command line
   */
  execute(command: string | Uint8Array): Promise<boolean> {
    return this.dispatcher.execute(command);
  }

  dump(): string {
    return [this.manager.dump(), this.dispatcher.dump()].join('\n');
  }

  /**
   * Tear down every interface and release the backend. Safe to call when not started.
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }

    await this.manager.tearDownAll();
    this.manager.unregisterListener(this.eventLogger);
    await this.backend.close?.();
    this.started = false;
    this.logger.info('wlanctl daemon stopped');
  }
}
