/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { AppError, ValidationError, createLogger, isOperationalError } from '@tradekit/utils';
import { ParseError } from '@tradekit/core';

const logger = createLogger('cli');

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /private[_-]?key/i,
  /bearer/i,
  /authorization/i,
];

/**
 * Credentials embedded in a URL, e.g. a --db-url value
 */
const URL_CREDENTIALS = /(\w+:\/\/)[^/\s:@]+:[^/\s@]+@/g;

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Sanitize error message to remove sensitive information
 */
function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }

  return maskUrlCredentials(message);
}

function maskUrlCredentials(message: string): string {
  return message.replace(URL_CREDENTIALS, '$1***@');
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  // These quote the user's own command line, which may contain words like "token"
  if (error instanceof ParseError || error instanceof ValidationError) {
    return maskUrlCredentials(error.message);
  }

  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }

  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }

  return 'An unexpected error occurred';
}

/**
 * Log error with full context (for debugging)
 * This should include full error details, but never expose secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  if (error instanceof AppError) {
    logger.error('CLI error', error, {
      code: error.code,
      operational: isOperationalError(error),
      context: sanitizedContext,
    });
  } else if (error instanceof Error) {
    logger.error('CLI error', error, { context: sanitizedContext });
  } else {
    logger.error('CLI error', { error: String(error) }, { context: sanitizedContext });
  }
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return formatError(error);
}
