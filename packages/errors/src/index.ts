/**
 * Error handling module for wlanctl
 *
 * - Domain error taxonomy for lifecycle, kernel and daemon failures
 * - Correlation-tracked error context
 * - Result types for call-in operations that must not throw
 */

export { ErrorSeverity, ErrorCategory, WlanError, type ErrorContext, type ErrorMetadata } from './types.js';

export {
  ConflictError,
  RadioNotFoundError,
  NoUsableInterfaceError,
  KernelError,
  ConfigGenerationError,
  DaemonStartError,
  DaemonStopError,
  ModeResetError,
  CommandParseError,
  AnomalyWarning,
  type DomainErrorOptions,
} from './domain.js';

export { ErrorContextManager, type ErrorContextOptions } from './context.js';

export {
  type Result,
  success,
  failure,
  safeAsync,
  wrapError,
  extractErrorInfo,
} from './utils.js';
