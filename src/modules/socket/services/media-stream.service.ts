/**
 * Media Stream Connection
 * One Twilio bidirectional media stream: inbound events are routed to the
 * call controller, and the call's outbound queue is pumped back to the
 * carrier as media, mark and clear messages.
 */

import { logger, generateId } from '@/shared/utils';
import type { LogSink } from '@/shared/utils';
import { callController, DuplicateSessionError } from '@/modules/call';
import type { CallController, OutboundItem } from '@/modules/call';
import type { AudioEncoding } from '@/modules/audio';
import type { MarkEvent, MediaEvent, MediaSocket, StartEvent } from '../types';
import {
  encodeForCarrier,
  parseTurnMark,
  parseTwilioMessage,
  serializeTwilioMessage,
  turnMarkName,
} from '../utils';

// Policy violation: the call already has a live stream
export const DUPLICATE_CALL_CLOSE_CODE = 1008;

export class MediaStreamConnection {
  readonly connectionId = generateId();

  private callId: string | null = null;
  private encoding: AudioEncoding = 'mulaw';
  private pumpTask: Promise<void> | null = null;
  private log: LogSink;

  constructor(
    private readonly socket: MediaSocket,
    private readonly controller: CallController = callController
  ) {
    this.log = logger.child({ connectionId: this.connectionId });
  }

  get activeCallId(): string | null {
    return this.callId;
  }

  handleMessage(raw: string): void {
    const message = parseTwilioMessage(raw);
    if (!message) {
      this.log.warn('Unrecognized media stream message');
      return;
    }

    switch (message.event) {
      case 'connected':
        this.log.debug('Media stream connected');
        break;
      case 'start':
        this.handleStart(message);
        break;
      case 'media':
        this.handleMedia(message);
        break;
      case 'mark':
        this.handleMark(message);
        break;
      case 'stop':
        this.finish('carrier stop');
        break;
    }
  }

  handleClose(code: number): void {
    this.finish(`socket closed (${code})`);
  }

  /**
   * Resolves once the outbound pump has stopped
   */
  async drained(): Promise<void> {
    await this.pumpTask;
  }

  private handleStart(event: StartEvent): void {
    if (this.callId) {
      this.log.warn('Duplicate start on media stream ignored');
      return;
    }

    try {
      this.controller.startCall(event.callSid);
    } catch (error) {
      if (error instanceof DuplicateSessionError) {
        this.log.error('Call already has a media stream', { callId: event.callSid });
        this.socket.close(DUPLICATE_CALL_CLOSE_CODE, 'Duplicate call');
        return;
      }
      throw error;
    }

    this.callId = event.callSid;
    this.encoding = event.encoding;
    this.log = this.log.child({ callId: event.callSid });
    this.pumpTask = this.pumpOutbound(event.callSid, event.streamSid);

    this.log.info('Media stream started', {
      streamSid: event.streamSid,
      encoding: event.encoding,
      sampleRate: event.sampleRate,
    });
  }

  private handleMedia(event: MediaEvent): void {
    if (!this.callId) {
      this.log.debug('Media before start dropped');
      return;
    }
    if (event.track && event.track !== 'inbound') {
      return;
    }
    this.controller.handleMedia(this.callId, event.payload, event.sequence, this.encoding);
  }

  private handleMark(event: MarkEvent): void {
    if (!this.callId) {
      return;
    }

    const generationId = parseTurnMark(event.name);
    if (generationId === null) {
      this.log.debug('Unknown mark ignored', { name: event.name });
      return;
    }
    this.controller.acknowledgeDrain(this.callId, generationId);
  }

  private finish(reason: string): void {
    if (!this.callId) {
      return;
    }

    const callId = this.callId;
    this.callId = null;
    this.controller.endCall(callId, reason);
  }

  private async pumpOutbound(callId: string, streamSid: string): Promise<void> {
    try {
      for await (const item of this.controller.outbound(callId)) {
        if (!this.socket.isOpen) {
          break;
        }
        this.sendItem(item, streamSid);
      }
    } catch (error) {
      this.log.error('Outbound audio pump failed', { error });
    }
  }

  private sendItem(item: OutboundItem, streamSid: string): void {
    switch (item.type) {
      case 'audio':
        for (const payload of encodeForCarrier(item.audio, item.sampleRate)) {
          this.socket.send(serializeTwilioMessage({ event: 'media', streamSid, media: { payload } }));
        }
        break;
      case 'end-of-turn':
        this.socket.send(
          serializeTwilioMessage({
            event: 'mark',
            streamSid,
            mark: { name: turnMarkName(item.generationId) },
          })
        );
        break;
      case 'clear':
        this.socket.send(serializeTwilioMessage({ event: 'clear', streamSid }));
        break;
    }
  }
}
