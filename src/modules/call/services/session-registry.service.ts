/**
 * Session Registry
 * Process-wide table of active calls (call id → CallSession)
 *
 * Every operation is synchronous, so create/get/remove are atomic with
 * respect to the event loop and a lookup never waits on another call.
 */

import { logger } from '@/shared/utils';
import { sttService } from '@/modules/stt';
import { llmService } from '@/modules/llm';
import { ttsService } from '@/modules/tts';
import { callConfig } from '../config/call.config';
import { CallState, DuplicateSessionError, UnknownSessionError } from '../types';
import type { CallIdentifier, SessionRegistryStats } from '../types';
import { CallSession } from './call-session.service';

export type CallSessionFactory = (callId: CallIdentifier) => CallSession;

export class SessionRegistry {
  private readonly sessions = new Map<CallIdentifier, CallSession>();

  constructor(private readonly createSession: CallSessionFactory) {}

  get size(): number {
    return this.sessions.size;
  }

  /**
   * @throws DuplicateSessionError when the id is already registered
   */
  create(callId: CallIdentifier): CallSession {
    if (this.sessions.has(callId)) {
      throw new DuplicateSessionError(callId);
    }

    const session = this.createSession(callId);
    this.sessions.set(callId, session);

    logger.info('Call session created', { callId, activeSessions: this.sessions.size });
    return session;
  }

  /**
   * @throws UnknownSessionError when the id is not registered
   */
  get(callId: CallIdentifier): CallSession {
    const session = this.sessions.get(callId);
    if (!session) {
      throw new UnknownSessionError(callId);
    }
    return session;
  }

  find(callId: CallIdentifier): CallSession | undefined {
    return this.sessions.get(callId);
  }

  has(callId: CallIdentifier): boolean {
    return this.sessions.has(callId);
  }

  /**
   * End the session (if still live) and forget it
   *
   * @throws UnknownSessionError when the id is not registered
   */
  remove(callId: CallIdentifier, reason = 'removed'): void {
    const session = this.get(callId);
    session.end(reason);
    this.sessions.delete(callId);

    logger.info('Call session removed', { callId, reason, activeSessions: this.sessions.size });
  }

  ids(): CallIdentifier[] {
    return [...this.sessions.keys()];
  }

  getStats(): SessionRegistryStats {
    const byState: Record<CallState, number> = {
      [CallState.IDLE]: 0,
      [CallState.LISTENING]: 0,
      [CallState.TRANSCRIBING]: 0,
      [CallState.GENERATING]: 0,
      [CallState.SYNTHESIZING]: 0,
      [CallState.SPEAKING]: 0,
      [CallState.ENDED]: 0,
    };

    for (const session of this.sessions.values()) {
      byState[session.state]++;
    }

    return { activeSessions: this.sessions.size, byState };
  }

  /**
   * End and remove every session; returns how many were removed
   */
  shutdown(reason = 'shutdown'): number {
    const count = this.sessions.size;
    for (const session of this.sessions.values()) {
      session.end(reason);
    }
    this.sessions.clear();

    if (count > 0) {
      logger.info('All call sessions ended', { count, reason });
    }
    return count;
  }
}

// Export singleton instance wired to the production adapters
export const sessionRegistry = new SessionRegistry(
  (callId) =>
    new CallSession(
      callId,
      { transcriber: sttService, responder: llmService, synthesizer: ttsService },
      callConfig
    )
);
