/**
 * OpenAI Error Classifier
 * Classifies OpenAI API errors for retry decisions
 */

import { errorMessage, extractStatusCode } from '@/shared/errors';

export enum LLMErrorType {
  FATAL = 'FATAL',
  AUTH = 'AUTH',
  RATE_LIMIT = 'RATE_LIMIT',
  NETWORK = 'NETWORK',
  RETRYABLE = 'RETRYABLE',
  UNKNOWN = 'UNKNOWN',
}

export interface ClassifiedLLMError {
  type: LLMErrorType;
  message: string;
  isRetryable: boolean;
  statusCode?: number;
}

/**
 * Classify LLM error for retry strategy
 */
export function classifyLLMError(error: unknown): ClassifiedLLMError {
  const statusCode = extractStatusCode(error);
  const message = errorMessage(error).toLowerCase();

  // Authentication errors
  if (
    statusCode === 401 ||
    statusCode === 403 ||
    message.includes('unauthorized') ||
    message.includes('invalid api key') ||
    message.includes('incorrect api key')
  ) {
    return {
      type: LLMErrorType.AUTH,
      message: 'Authentication failed with OpenAI',
      isRetryable: false,
      statusCode,
    };
  }

  // Rate limit errors
  if (statusCode === 429 || message.includes('rate limit') || message.includes('too many requests')) {
    return {
      type: LLMErrorType.RATE_LIMIT,
      message: 'OpenAI rate limit exceeded',
      isRetryable: true,
      statusCode,
    };
  }

  // Fatal errors (context length, invalid request)
  if (
    (statusCode !== undefined && statusCode >= 400 && statusCode < 500) ||
    message.includes('maximum context length') ||
    message.includes('model not found')
  ) {
    return {
      type: LLMErrorType.FATAL,
      message: 'Fatal OpenAI API error',
      isRetryable: false,
      statusCode,
    };
  }

  if (statusCode !== undefined && statusCode >= 500) {
    return {
      type: LLMErrorType.RETRYABLE,
      message: `OpenAI server error ${statusCode}`,
      isRetryable: true,
      statusCode,
    };
  }

  // Network errors
  if (
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('network') ||
    message.includes('timeout') ||
    message.includes('timed out')
  ) {
    return {
      type: LLMErrorType.NETWORK,
      message: 'Network error connecting to OpenAI',
      isRetryable: true,
    };
  }

  // Default to retryable unknown
  return {
    type: LLMErrorType.UNKNOWN,
    message: 'Unknown OpenAI error',
    isRetryable: true,
  };
}
