/**
 * Domain-specific error classes for interface lifecycle operations
 */

import { ErrorContextManager, type ErrorContextOptions } from './context.js';
import {
  WlanError,
  ErrorSeverity,
  ErrorCategory,
  type ErrorContext,
  type ErrorMetadata,
} from './types.js';

export interface DomainErrorOptions {
  code?: string;
  cause?: Error;
  data?: Record<string, unknown>;
  severity?: ErrorSeverity;
  /** A full context, or options for a fresh one */
  context?: ErrorContext | ErrorContextOptions;
}

const isErrorContext = (value: ErrorContext | ErrorContextOptions): value is ErrorContext =>
  'timestamp' in value && value.timestamp instanceof Date && typeof value.correlationId === 'string';

function buildMetadata(
  category: ErrorCategory,
  defaultSeverity: ErrorSeverity,
  options: DomainErrorOptions
): ErrorMetadata {
  const { cause, data, severity = defaultSeverity, context = {} } = options;

  const metadata: ErrorMetadata = {
    severity,
    category,
    context: isErrorContext(context) ? context : ErrorContextManager.createContext(context),
  };

  if (cause !== undefined) {
    metadata.cause = cause;
  }
  if (data !== undefined) {
    metadata.data = data;
  }

  return metadata;
}

/**
 * A lifecycle invariant would be violated (second station interface, index already claimed,
 * second AP session)
 */
export class ConflictError extends WlanError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'CONFLICT',
      buildMetadata(ErrorCategory.INVARIANT, ErrorSeverity.MEDIUM, options)
    );
  }
}

/**
 * The radio backing the base interface could not be resolved
 */
export class RadioNotFoundError extends WlanError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'RADIO_NOT_FOUND',
      buildMetadata(ErrorCategory.INTERFACE, ErrorSeverity.MEDIUM, options)
    );
  }
}

/**
 * No interface in the snapshot (or bridge lookup) qualified for the request
 */
export class NoUsableInterfaceError extends WlanError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'NO_USABLE_INTERFACE',
      buildMetadata(ErrorCategory.INTERFACE, ErrorSeverity.MEDIUM, options)
    );
  }
}

/**
 * A kernel query failed outright (e.g. interface enumeration)
 */
export class KernelError extends WlanError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'KERNEL_ERROR',
      buildMetadata(ErrorCategory.KERNEL, ErrorSeverity.HIGH, options)
    );
  }
}

export class ConfigGenerationError extends WlanError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'CONFIG_GENERATION_FAILED',
      buildMetadata(ErrorCategory.CONFIGURATION, ErrorSeverity.MEDIUM, options)
    );
  }
}

export class DaemonStartError extends WlanError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'DAEMON_START_FAILED',
      buildMetadata(ErrorCategory.DAEMON, ErrorSeverity.HIGH, options)
    );
  }
}

export class DaemonStopError extends WlanError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'DAEMON_STOP_FAILED',
      buildMetadata(ErrorCategory.DAEMON, ErrorSeverity.HIGH, options)
    );
  }
}

/**
 * The interface could not be forced back to station mode after an AP session
 */
export class ModeResetError extends WlanError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'MODE_RESET_FAILED',
      buildMetadata(ErrorCategory.KERNEL, ErrorSeverity.HIGH, options)
    );
  }
}

/**
 * Malformed, oversized or unknown vendor command
 */
export class CommandParseError extends WlanError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'COMMAND_PARSE_FAILED',
      buildMetadata(ErrorCategory.VALIDATION, ErrorSeverity.MEDIUM, options)
    );
  }
}

/**
 * Non-fatal anomaly. Logged, never returned as the failure of an operation.
 */
export class AnomalyWarning extends WlanError {
  constructor(message: string, options: Omit<DomainErrorOptions, 'severity'> = {}) {
    super(
      message,
      options.code ?? 'ANOMALY',
      buildMetadata(ErrorCategory.ANOMALY, ErrorSeverity.LOW, options)
    );
  }
}
