/**
 * Centralized Error Handling
 */

import { logger } from '../lib/logger';
import { AppError, ApiError } from './error-types';

const FALLBACK_MESSAGE = 'Operation failed. Please try again.';

/**
 * Logs an error and returns the message to show the user.
 */
export function describeError(error: unknown): string {
  if (error instanceof ApiError) {
    logger.warn(`[${error.kind}] ${error.message}`, { status: error.status });
    if (error.kind === 'network') return 'Network error. Check your connection and try again.';
    return error.message || FALLBACK_MESSAGE;
  }

  if (error instanceof AppError) {
    logger.error(`[${error.code}] ${error.message}`, { statusCode: error.statusCode, cause: error.cause });
    return error.message || FALLBACK_MESSAGE;
  }

  if (error instanceof Error) {
    logger.error('Unexpected error', { error: error.message, stack: error.stack });
    return error.message || FALLBACK_MESSAGE;
  }

  logger.error('Unknown error', { error });
  return FALLBACK_MESSAGE;
}
