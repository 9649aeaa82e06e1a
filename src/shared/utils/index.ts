/**
 * Shared Utilities
 */

export { logger, Logger, LogLevel, parseLogLevel, serializeError } from './logger';
export type { LogMeta, LogSink } from './logger';
export { generateId } from './uuid';
export {
  TurnCancelledError,
  isTurnCancelled,
  throwIfCancelled,
  raceWithAbort,
  abortableDelay,
} from './cancellation';
export type { TurnToken } from './cancellation';
export { withRetry, getRetryDelay } from './retry';
export type { RetryPolicy, RetryOptions } from './retry';
