/**
 * TTS Retry Configuration
 */

import type { RetryPolicy } from '@/shared/utils';

export const ttsRetryConfig: RetryPolicy = {
  // Maximum retry attempts
  maxRetries: parseInt(process.env.TTS_MAX_RETRIES || '2', 10),

  // Exponential backoff delays (milliseconds)
  baseDelay: 250,
  maxDelay: 2000,
};
