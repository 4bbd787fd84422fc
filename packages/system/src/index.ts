export {
  runCommand,
  readSysfs,
  exitCodeOf,
  type CommandRunner,
  type CommandOutput,
  type SysfsReader,
} from './exec.js';
export {
  parseIwDev,
  parseIwPhyBands,
  parseIwEventLine,
  type IwDevEntry,
  type IwEvent,
} from './parsers.js';
export {
  ManagedProcess,
  spawnProcess,
  type ProcessSpawner,
  type ManagedProcessOptions,
} from './process.js';
export {
  SystemInterfaceTool,
  SYS_CLASS_NET,
  type SystemInterfaceToolOptions,
} from './interface-tool.js';
export { IwEventMonitor, type IwEventMonitorOptions } from './iw-event-monitor.js';
export { SystemNetlinkClient, type SystemNetlinkClientOptions } from './netlink-client.js';
export { HostapdManager, type HostapdManagerOptions } from './hostapd.js';
export { SupplicantManager, type SupplicantManagerOptions } from './supplicant.js';
export { CommandLineVendorTool, type CommandLineVendorToolOptions } from './vendor-tool.js';
