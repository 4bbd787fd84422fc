export { Logger, parseLogLevel } from './logger.js';
export { LoggerFactory, type LoggingOptions } from './factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { FileTransport, parseSize } from './transports/file-transport.js';
export { MemoryTransport } from './transports/memory-transport.js';
export { formatJson, formatText } from './format.js';
export {
  LogLevel,
  LOG_LEVELS,
  LOG_FORMATS,
  type LogLevelString,
  type LogFormat,
  type LogData,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type FileTransportConfig,
  type ConsoleTransportConfig,
} from './types.js';
