/**
 * Error handling utilities and helper functions
 */

import { ErrorContextManager, type ErrorContextOptions } from './context.js';
import { WlanError, ErrorCategory, ErrorSeverity } from './types.js';

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: E };

export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function failure<E = Error>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Wrap an async operation to return a Result instead of throwing
 */
export async function safeAsync<T>(operation: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    const data = await operation();
    return success(data);
  } catch (error) {
    return failure(error instanceof Error ? error : new Error(String(error)));
  }
}

class UnclassifiedError extends WlanError {}

/**
 * Wrap an unknown thrown value into a WlanError, keeping WlanErrors as they are
 */
export function wrapError(
  error: unknown,
  message?: string,
  options: {
    category?: ErrorCategory;
    severity?: ErrorSeverity;
    context?: ErrorContextOptions;
  } = {}
): WlanError {
  if (error instanceof WlanError && message === undefined) {
    return error;
  }

  const originalError = error instanceof Error ? error : new Error(String(error));
  const { category = ErrorCategory.UNKNOWN, severity = ErrorSeverity.MEDIUM } = options;

  return new UnclassifiedError(message ?? originalError.message, 'UNKNOWN_ERROR', {
    severity,
    category,
    context: ErrorContextManager.createContext(options.context),
    cause: originalError,
  });
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof WlanError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}
