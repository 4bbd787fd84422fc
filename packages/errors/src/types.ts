/**
 * Error types and base classes for interface lifecycle error handling
 */

/**
 * Error severity levels for classification and handling
 */
export enum ErrorSeverity {
  /** Informational anomalies that never fail an operation */
  LOW = 'low',
  /** The requested operation failed, the daemon state is unaffected */
  MEDIUM = 'medium',
  /** The operation failed part-way and left kernel or daemon state behind */
  HIGH = 'high',
  /** The daemon cannot continue without operator action */
  CRITICAL = 'critical',
}

/**
 * Error categories for domain-specific handling
 */
export enum ErrorCategory {
  /** Lifecycle invariant violations (second station interface, claimed index) */
  INVARIANT = 'invariant',
  /** Radio or interface lookups against the kernel */
  INTERFACE = 'interface',
  /** Kernel calls that failed outright */
  KERNEL = 'kernel',
  /** hostapd / wpa_supplicant control */
  DAEMON = 'daemon',
  /** Configuration generation and loading */
  CONFIGURATION = 'configuration',
  /** Malformed input such as vendor commands */
  VALIDATION = 'validation',
  /** Non-fatal anomalies */
  ANOMALY = 'anomaly',
  UNKNOWN = 'unknown',
}

/**
 * Error context for tracking operations and debugging
 */
export interface ErrorContext {
  /** Unique correlation ID for tracking errors across operations */
  correlationId: string;
  /** Operation name or identifier */
  operation?: string;
  /** Component or module where the error occurred */
  component?: string;
  /** Additional metadata for debugging */
  metadata?: Record<string, unknown>;
  /** Timestamp when the error occurred */
  timestamp: Date;
}

export interface ErrorMetadata {
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: ErrorContext;
  /** Original error that caused this error */
  cause?: Error;
  /** Additional error-specific data */
  data?: Record<string, unknown>;
}

/**
 * Base error class with metadata and context tracking
 */
export abstract class WlanError extends Error {
  public readonly code: string;
  public readonly metadata: ErrorMetadata;

  constructor(message: string, code: string, metadata: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.metadata.severity,
      category: this.metadata.category,
      correlationId: this.metadata.context.correlationId,
      operation: this.metadata.context.operation,
      component: this.metadata.context.component,
      timestamp: this.metadata.context.timestamp,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(this.metadata.cause && { cause: this.metadata.cause.message }),
    };
  }

  /**
   * Whether this error represents a failed operation rather than a logged anomaly
   */
  isFailure(): boolean {
    return this.metadata.severity !== ErrorSeverity.LOW;
  }
}
