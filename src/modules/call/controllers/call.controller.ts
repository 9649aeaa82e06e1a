/**
 * Call Controller
 * Public API for the transport layer. The transport only ever holds call
 * ids; every frame and acknowledgement is routed through the registry.
 */

import { logger } from '@/shared/utils';
import { audioFrameDecoder, MalformedFrameError } from '@/modules/audio';
import type { AudioEncoding, AudioFrameDecoder } from '@/modules/audio';
import { sessionRegistry } from '../services/session-registry.service';
import type { SessionRegistry } from '../services/session-registry.service';
import type { CallIdentifier, OutboundItem, SessionRegistryStats } from '../types';

export class CallController {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly decoder: AudioFrameDecoder = audioFrameDecoder
  ) {}

  /**
   * @throws DuplicateSessionError when the call is already active
   */
  startCall(callId: CallIdentifier): void {
    this.registry.create(callId);
  }

  /**
   * Decode one carrier payload and route it to the call's session.
   * Returns false when the frame was not delivered.
   */
  handleMedia(
    callId: CallIdentifier,
    payload: string,
    sequence: number,
    encoding: AudioEncoding = 'mulaw'
  ): boolean {
    const session = this.registry.find(callId);
    if (!session) {
      logger.warn('Media for unknown call', { callId, sequence });
      return false;
    }

    try {
      session.onAudioFrame(this.decoder.decode(payload, sequence, encoding));
      return true;
    } catch (error) {
      if (error instanceof MalformedFrameError) {
        logger.warn('Malformed frame skipped', { callId, sequence, reason: error.message });
        return false;
      }
      throw error;
    }
  }

  /**
   * The carrier finished playing a turn's audio
   */
  acknowledgeDrain(callId: CallIdentifier, generationId?: number): boolean {
    const session = this.registry.find(callId);
    if (!session) {
      logger.warn('Drain acknowledgement for unknown call', { callId, generationId });
      return false;
    }
    session.onOutboundDrained(generationId);
    return true;
  }

  /**
   * @throws UnknownSessionError when the call is not active
   */
  outbound(callId: CallIdentifier): AsyncIterable<OutboundItem> {
    return this.registry.get(callId).outbound;
  }

  endCall(callId: CallIdentifier, reason = 'call ended'): boolean {
    if (!this.registry.has(callId)) {
      logger.debug('End for unknown call ignored', { callId, reason });
      return false;
    }
    this.registry.remove(callId, reason);
    return true;
  }

  hasCall(callId: CallIdentifier): boolean {
    return this.registry.has(callId);
  }

  getStats(): SessionRegistryStats {
    return this.registry.getStats();
  }

  shutdown(): number {
    return this.registry.shutdown();
  }
}

// Export singleton instance
export const callController = new CallController(sessionRegistry);
