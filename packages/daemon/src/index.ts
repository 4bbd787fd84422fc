export {
  WlanctlConfigSchema,
  DEFAULT_CONFIG_PATH,
  createConfigManager,
  toApDaemonSettings,
  type WlanctlConfig,
  type AccessPointConfig,
} from './config.js';
export { WlanDaemon, createSystemBackend, createDaemonLogger, type DaemonBackend } from './daemon.js';
export { LoggingEventListener } from './event-logger.js';
export { createProgram } from './program.js';
