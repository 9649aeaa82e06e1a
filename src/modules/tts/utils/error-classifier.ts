/**
 * Synthesis Error Classifier
 * Maps speech endpoint failures onto retry decisions
 */

import { errorMessage, extractStatusCode } from '@/shared/errors';
import { TTSErrorType } from '../types';
import type { ClassifiedError } from '../types';

const CONNECTION_HINTS = ['connection', 'network', 'econnrefused', 'econnreset', 'enotfound'];

function byStatus(statusCode: number, message: string): ClassifiedError | null {
  if (statusCode === 401 || statusCode === 403) {
    return { type: TTSErrorType.AUTH, message: 'Authentication failed', statusCode, retryable: false };
  }
  if (statusCode === 429) {
    return { type: TTSErrorType.RATE_LIMIT, message: 'Rate limit exceeded', statusCode, retryable: true };
  }
  if (statusCode >= 400 && statusCode < 500) {
    // Unknown voice, input too long and similar request problems
    return { type: TTSErrorType.FATAL, message: `Client error: ${message}`, statusCode, retryable: false };
  }
  if (statusCode >= 500 && statusCode < 600) {
    return { type: TTSErrorType.TRANSIENT, message: `Server error: ${message}`, statusCode, retryable: true };
  }
  return null;
}

export function classifySynthesisError(error: unknown): ClassifiedError {
  if (error === null || error === undefined) {
    return { type: TTSErrorType.TRANSIENT, message: 'Unknown error', retryable: true };
  }

  const message = errorMessage(error) || 'Unknown error';
  const statusCode = extractStatusCode(error);
  const fromStatus = statusCode === undefined ? null : byStatus(statusCode, message);
  if (fromStatus) {
    return fromStatus;
  }

  const lower = message.toLowerCase();
  if (lower.includes('timeout') || lower.includes('timed out')) {
    return { type: TTSErrorType.TIMEOUT, message: 'Request timeout', retryable: true };
  }
  if (CONNECTION_HINTS.some((hint) => lower.includes(hint))) {
    return { type: TTSErrorType.CONNECTION, message: 'Connection error', retryable: true };
  }

  return { type: TTSErrorType.TRANSIENT, message, retryable: true };
}

/**
 * Auth and request errors fail the same way on every attempt
 */
export function isFatalError(error: ClassifiedError): boolean {
  return error.type === TTSErrorType.FATAL || error.type === TTSErrorType.AUTH;
}
