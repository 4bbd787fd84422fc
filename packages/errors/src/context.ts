/**
 * Error context utilities for correlation tracking
 */

import { randomUUID } from 'crypto';

import type { ErrorContext } from './types.js';

export interface ErrorContextOptions {
  operation?: string;
  component?: string;
  metadata?: Record<string, unknown>;
  correlationId?: string;
}

export class ErrorContextManager {
  private constructor() {}

  /**
   * Generate a new correlation ID
   */
  static generateCorrelationId(): string {
    return randomUUID();
  }

  /**
   * Create a new error context
   */
  static createContext(options: ErrorContextOptions = {}): ErrorContext {
    const context: ErrorContext = {
      correlationId: options.correlationId || ErrorContextManager.generateCorrelationId(),
      timestamp: new Date(),
    };

    if (options.operation !== undefined) {
      context.operation = options.operation;
    }
    if (options.component !== undefined) {
      context.component = options.component;
    }
    if (options.metadata !== undefined) {
      context.metadata = options.metadata;
    }

    return context;
  }

  /**
   * Create a context that keeps the parent's correlation ID but names its own operation
   */
  static createChildContext(parent: ErrorContext, options: ErrorContextOptions = {}): ErrorContext {
    const combinedMetadata = { ...parent.metadata, ...options.metadata };
    const childOptions: ErrorContextOptions = {
      correlationId: parent.correlationId,
    };

    const operation = options.operation ?? parent.operation;
    if (operation !== undefined) {
      childOptions.operation = operation;
    }
    const component = options.component ?? parent.component;
    if (component !== undefined) {
      childOptions.component = component;
    }
    if (Object.keys(combinedMetadata).length > 0) {
      childOptions.metadata = combinedMetadata;
    }

    return ErrorContextManager.createContext(childOptions);
  }
}
