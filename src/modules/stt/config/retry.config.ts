/**
 * STT Retry Configuration
 * A caller is waiting on every transcription, so retries stay short
 */

import type { RetryPolicy } from '@/shared/utils';

export const sttRetryConfig: RetryPolicy = {
  maxRetries: parseInt(process.env.STT_MAX_RETRIES || '2', 10),
  baseDelay: 250,
  maxDelay: 2000,
};
