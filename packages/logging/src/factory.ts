import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { MemoryTransport } from './transports/memory-transport.js';
import { LogLevel, type LogFormat, type LogLevelString, type LogTransport } from './types.js';

/**
 * Logging section of the daemon configuration
 */
export interface LoggingOptions {
  level: LogLevel | LogLevelString;
  file?: string | undefined;
  format?: LogFormat | undefined;
  maxSize?: string | undefined;
  maxFiles?: number | undefined;
  colors?: boolean | undefined;
}

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger with console transport only
   */
  static createConsoleLogger(
    component: string,
    level: LogLevel | LogLevelString = LogLevel.INFO
  ): Logger {
    return new Logger({
      component,
      level,
      transports: [new ConsoleTransport({ format: 'text', colors: true })],
    });
  }

  /**
   * Create a console logger, plus a file transport when a file is configured
   */
  static createFromOptions(component: string, options: LoggingOptions): Logger {
    const format = options.format ?? 'text';
    const transports: LogTransport[] = [
      new ConsoleTransport({ format, colors: options.colors ?? format === 'text' }),
    ];

    if (options.file) {
      transports.push(
        new FileTransport({
          filename: options.file,
          format,
          ...(options.maxSize !== undefined && { maxSize: options.maxSize }),
          ...(options.maxFiles !== undefined && { maxFiles: options.maxFiles }),
        })
      );
    }

    return new Logger({ component, level: options.level, transports });
  }

  /**
   * Create a logger that only records into memory; returns the transport for inspection
   */
  static createMemoryLogger(
    component: string,
    level: LogLevel | LogLevelString = LogLevel.DEBUG
  ): { logger: Logger; transport: MemoryTransport } {
    const transport = new MemoryTransport();
    return { logger: new Logger({ component, level, transports: [transport] }), transport };
  }
}
