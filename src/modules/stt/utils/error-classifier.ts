/**
 * Error Classification Utility
 * Classifies Deepgram errors as fatal vs retryable
 */

import { logger } from '@/shared/utils';
import { errorMessage, extractStatusCode } from '@/shared/errors';

export enum ErrorType {
  FATAL = 'fatal',
  RETRYABLE = 'retryable',
  TIMEOUT = 'timeout',
}

export interface ClassifiedError {
  type: ErrorType;
  statusCode?: number;
  message: string;
  retryable: boolean;
}

const FATAL_STATUS_MESSAGES: Record<number, string> = {
  400: 'Invalid request configuration',
  401: 'Invalid API key',
  402: 'Insufficient credits',
  403: 'Access forbidden',
  404: 'Endpoint not found',
};

/**
 * Check if error is a network/timeout error
 */
function isNetworkError(message: string): boolean {
  const networkKeywords = [
    'network',
    'timeout',
    'econnrefused',
    'econnreset',
    'etimedout',
    'enotfound',
    'socket hang up',
    'fetch failed',
  ];

  return networkKeywords.some((keyword) => message.includes(keyword));
}

/**
 * Classify Deepgram error for retry strategy
 */
export function classifyDeepgramError(error: unknown): ClassifiedError {
  const statusCode = extractStatusCode(error);
  const message = errorMessage(error);

  logger.debug('Classifying Deepgram error', { message, statusCode });

  if (statusCode !== undefined) {
    const fatalMessage = FATAL_STATUS_MESSAGES[statusCode];
    if (fatalMessage) {
      return { type: ErrorType.FATAL, statusCode, message: fatalMessage, retryable: false };
    }

    if (statusCode === 429) {
      return { type: ErrorType.RETRYABLE, statusCode, message: 'Rate limit exceeded', retryable: true };
    }

    if (statusCode >= 500) {
      return {
        type: ErrorType.RETRYABLE,
        statusCode,
        message: `Server error ${statusCode}`,
        retryable: true,
      };
    }

    if (statusCode >= 400) {
      return {
        type: ErrorType.FATAL,
        statusCode,
        message: `Client error ${statusCode}`,
        retryable: false,
      };
    }
  }

  if (isNetworkError(message.toLowerCase())) {
    return { type: ErrorType.TIMEOUT, message: 'Network or timeout error', retryable: true };
  }

  // Unknown error - treat as retryable
  logger.warn('Unknown Deepgram error type, treating as retryable', { message });
  return { type: ErrorType.RETRYABLE, message: message || 'Unknown error', retryable: true };
}

/**
 * Check if error should trigger immediate failure
 */
export function isFatalError(error: unknown): boolean {
  return classifyDeepgramError(error).type === ErrorType.FATAL;
}

/**
 * Check if error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return classifyDeepgramError(error).retryable;
}
