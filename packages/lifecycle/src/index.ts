/**
 * Interface lifecycle core: controllers, manager, listener registry, kernel event hub
 * and the vendor command dispatcher
 */

export {
  createRadioHandle,
  isRadioHandle,
  createInterfaceDescriptor,
  InterfaceMode,
  StationEventKind,
  EncryptionType,
  type RadioHandle,
  type MacAddress,
  type InterfaceDescriptor,
  type StationEvent,
  type RegDomainChangeEvent,
  type BandInfo,
  type ApDaemonSettings,
} from './types.js';

export type {
  SubscriptionToken,
  StationEventHandler,
  RegDomainChangeHandler,
  KernelEventSource,
  NetlinkClient,
  InterfaceTool,
  HostapdController,
  SupplicantController,
  VendorTool,
} from './collaborators.js';

export { formatMacAddress, parseMacAddress } from './mac.js';
export { KernelEventHub } from './events/kernel-event-hub.js';
export { EventListenerRegistry } from './events/registry.js';
export type { InterfaceEvent, InterfaceEventKind, InterfaceEventListener } from './events/types.js';
export {
  AccessPointInterfaceController,
  ApInterfaceState,
  type AccessPointControllerDeps,
} from './controllers/ap-interface.js';
export {
  StationInterfaceController,
  type StationControllerDeps,
} from './controllers/station-interface.js';
export { SerialExecutor } from './serial-executor.js';
export {
  InterfaceLifecycleManager,
  DEFAULT_BASE_INTERFACE,
  DEFAULT_RESERVED_STATION_NAMES,
  DEFAULT_RESERVED_STATION_PREFIXES,
  type LifecycleManagerOptions,
  type LifecycleManagerDeps,
  type CreateInterfaceError,
} from './manager.js';
export {
  CommandDispatcher,
  DEFAULT_MAX_COMMAND_TOKENS,
  type ApSession,
  type CommandDispatcherOptions,
} from './commands/dispatcher.js';
