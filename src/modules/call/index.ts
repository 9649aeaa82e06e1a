/**
 * Call Module Public Exports
 */

export { callController, CallController } from './controllers/call.controller';
export { CallSession, isIntelligible, OutboundAudioQueue, SessionRegistry, sessionRegistry } from './services';
export type { CallSessionFactory } from './services';
export { callConfig } from './config/call.config';
export { CallState, DuplicateSessionError, UnknownSessionError } from './types';
export type {
  CallIdentifier,
  CallSessionConfig,
  CallSessionDependencies,
  CallSessionMetrics,
  OutboundItem,
  SessionRegistryStats,
} from './types';
