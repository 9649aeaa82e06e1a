/**
 * LLM Retry Configuration
 */

import type { RetryPolicy } from '@/shared/utils';

export const llmRetryConfig: RetryPolicy = {
  maxRetries: parseInt(process.env.LLM_MAX_RETRIES || '1', 10),
  baseDelay: 500,
  maxDelay: 2000,
};
