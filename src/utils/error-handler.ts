/**
 * Centralized error handling utilities
 */

import { createLogger } from './logger.js';
import { JamfAPIError, NetworkError, AuthenticationError } from './errors.js';

const logger = createLogger('error-handler');

/**
 * Convert any error to JamfAPIError
 */
export function normalizeError(error: unknown, context?: Record<string, unknown>): JamfAPIError {
  if (error instanceof JamfAPIError) {
    return error;
  }

  if (error instanceof Error) {
    // Check for network errors
    if (error.message.includes('ECONNREFUSED') ||
        error.message.includes('ETIMEDOUT') ||
        error.message.includes('ENOTFOUND')) {
      return NetworkError.fromError(error, context);
    }

    // Check for auth errors
    if (error.message.toLowerCase().includes('unauthorized') ||
        error.message.toLowerCase().includes('authentication')) {
      return new AuthenticationError(error.message, context, error);
    }

    return new JamfAPIError(
      error.message,
      undefined,
      'UNKNOWN_ERROR',
      ['Check the logs for more details'],
      context,
      error
    );
  }

  // Not an Error object
  return new JamfAPIError(
    String(error),
    undefined,
    'UNKNOWN_ERROR',
    ['An unexpected error occurred'],
    context
  );
}

/**
 * Structured error context for capturing full error details
 */
export interface ErrorContext {
  /** The operation that was being performed */
  operation: string;
  message: string;
  /** Technical error code for programmatic handling */
  code?: string;
  component?: string;
  stack?: string;
  metadata?: Record<string, unknown>;
  suggestions?: string[];
  timestamp: string;
}

/**
 * Build structured error context from an unknown error
 */
export function buildErrorContext(
  error: unknown,
  operation: string,
  component?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  const timestamp = new Date().toISOString();

  if (error instanceof JamfAPIError) {
    return {
      operation,
      message: error.message,
      code: error.errorCode || 'JAMF_API_ERROR',
      component,
      stack: error.stack || error.originalError?.stack,
      metadata: {
        ...metadata,
        statusCode: error.statusCode,
        originalContext: error.context,
      },
      suggestions: error.suggestions,
      timestamp,
    };
  }

  if (error instanceof Error) {
    return {
      operation,
      message: error.message,
      code: 'ERROR',
      component,
      stack: error.stack,
      metadata,
      timestamp,
    };
  }

  return {
    operation,
    message: String(error),
    code: 'UNKNOWN_ERROR',
    component,
    metadata,
    timestamp,
  };
}

/**
 * Log error with full context
 */
export function logErrorWithContext(
  error: unknown,
  operation: string,
  component?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  const context = buildErrorContext(error, operation, component, metadata);

  logger.error(`${operation} failed`, {
    error: context.message,
    code: context.code,
    component: context.component,
    stack: context.stack,
    metadata: context.metadata,
    suggestions: context.suggestions,
  });

  return context;
}

/**
 * Unhandled rejection and uncaught exception handlers for CLI entry points
 */
export function setupGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    process.exitCode = 1;
  });

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', {
      error: error.message,
      stack: error.stack,
    });
    process.exit(1);
  });
}
