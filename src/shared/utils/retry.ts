/**
 * Retry helper for external engine calls
 * Exponential backoff whose waits end early when the turn is cancelled
 */

import { logger } from './logger';
import { abortableDelay, isTurnCancelled, throwIfCancelled } from './cancellation';
import type { TurnToken } from './cancellation';

export interface RetryPolicy {
  /** Attempts after the first one */
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
}

export interface RetryOptions extends RetryPolicy {
  /** Label used in log lines, e.g. 'deepgram' */
  operation: string;
  isRetryable(error: unknown): boolean;
}

/**
 * Get retry delay for attempt (exponential backoff)
 */
export function getRetryDelay(attemptNumber: number, baseDelay = 1000, maxDelay = 8000): number {
  return Math.min(baseDelay * Math.pow(2, attemptNumber), maxDelay);
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  token: TurnToken,
  options: RetryOptions
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    throwIfCancelled(token);
    try {
      return await operation();
    } catch (error) {
      if (isTurnCancelled(error) || attempt >= options.maxRetries || !options.isRetryable(error)) {
        throw error;
      }

      const delay = getRetryDelay(attempt, options.baseDelay, options.maxDelay);
      logger.warn(`Retrying ${options.operation}`, {
        callId: token.callId,
        generationId: token.generationId,
        attempt: attempt + 1,
        delay,
        error: error instanceof Error ? error.message : String(error),
      });
      await abortableDelay(delay, token);
    }
  }
}
