/**
 * Shared Configuration
 * Process-level settings; module settings live in each module's config/
 */

import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: parseInt(process.env.PORT || '3001', 10),

  // Host put in the TwiML stream URL; the webhook request's Host otherwise
  PUBLIC_HOST: process.env.PUBLIC_HOST,
  // Optional <Say> before the stream connects
  CALL_GREETING: process.env.CALL_GREETING,

  DEEPGRAM_API_KEY: process.env.DEEPGRAM_API_KEY,
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,

  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

type ProviderKey = 'DEEPGRAM_API_KEY' | 'OPENAI_API_KEY';

const PROVIDER_KEYS: ProviderKey[] = ['DEEPGRAM_API_KEY', 'OPENAI_API_KEY'];

/**
 * Fail startup on settings no call could run without
 */
export function validateEnv(): void {
  const problems: string[] = [];

  if (!Number.isInteger(env.PORT) || env.PORT <= 0 || env.PORT > 65535) {
    problems.push(`PORT must be a TCP port, got "${process.env.PORT}"`);
  }

  const missingKeys = PROVIDER_KEYS.filter((key) => !env[key]);
  if (missingKeys.length > 0) {
    problems.push(`missing provider keys: ${missingKeys.join(', ')}`);
  }

  if (problems.length > 0) {
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }
}

export * from './socket';
