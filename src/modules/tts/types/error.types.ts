/**
 * TTS Error Types
 */

import { ExternalDependencyError } from '@/shared/errors';

export enum TTSErrorType {
  CONNECTION = 'connection',
  TIMEOUT = 'timeout',
  RATE_LIMIT = 'rate_limit',
  AUTH = 'auth',
  FATAL = 'fatal',
  TRANSIENT = 'transient',
}

export interface ClassifiedError {
  type: TTSErrorType;
  message: string;
  statusCode?: number;
  retryable: boolean;
}

/**
 * The synthesis engine failed for a piece of reply text
 */
export class SynthesisError extends ExternalDependencyError {
  readonly code = 'SYNTHESIS_FAILED';
}
