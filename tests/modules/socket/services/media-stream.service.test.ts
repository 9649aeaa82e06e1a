/**
 * Media Stream Connection Tests
 * Twilio events in, media/mark/clear messages out, over an in-memory socket
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CallController, CallSession, CallState, SessionRegistry } from '@/modules/call';
import type { VoiceActivityDetector } from '@/modules/audio';
import { DUPLICATE_CALL_CLOSE_CODE, MediaStreamConnection } from '@/modules/socket';
import type { MediaSocket } from '@/modules/socket';
import { SILENCE_PAYLOAD, SPEECH_PAYLOAD } from '../../../helpers/audio';
import {
  FakeResponder,
  FakeSynthesizer,
  FakeTranscriber,
  flushAsync,
  testCallConfig,
} from '../../../helpers/fakes';

const anySoundVad: VoiceActivityDetector = {
  isSpeech: (frame) => frame.samples.some((sample) => sample !== 0),
};

class FakeMediaSocket implements MediaSocket {
  isOpen = true;
  readonly sent: unknown[] = [];
  readonly closes: { code?: number; reason?: string }[] = [];

  send(data: string): boolean {
    this.sent.push(JSON.parse(data));
    return true;
  }

  close(code?: number, reason?: string): void {
    this.isOpen = false;
    this.closes.push({ code, reason });
  }
}

const startMessage = JSON.stringify({
  event: 'start',
  streamSid: 'MZ-test',
  start: {
    callSid: 'CA-test',
    streamSid: 'MZ-test',
    mediaFormat: { encoding: 'audio/x-mulaw', sampleRate: 8000, channels: 1 },
  },
});

function mediaMessage(sequence: number, payload: string, track = 'inbound'): string {
  return JSON.stringify({
    event: 'media',
    sequenceNumber: String(sequence),
    media: { track, payload },
  });
}

describe('MediaStreamConnection', () => {
  let registry: SessionRegistry;
  let controller: CallController;
  let transcriber: FakeTranscriber;
  let responder: FakeResponder;
  let socket: FakeMediaSocket;
  let connection: MediaStreamConnection;
  let sequence: number;

  beforeEach(() => {
    transcriber = new FakeTranscriber();
    responder = new FakeResponder();
    // 160 silent samples at the carrier rate: exactly one outbound frame
    const synthesizer = new FakeSynthesizer(8000);
    synthesizer.respond = async () => Buffer.alloc(320);

    registry = new SessionRegistry(
      (callId) =>
        new CallSession(
          callId,
          { transcriber, responder, synthesizer, vad: anySoundVad },
          testCallConfig
        )
    );
    controller = new CallController(registry);
    socket = new FakeMediaSocket();
    connection = new MediaStreamConnection(socket, controller);
    sequence = 1;
  });

  afterEach(() => {
    controller.shutdown();
  });

  function sendAudio(payloads: string[]): void {
    for (const payload of payloads) {
      connection.handleMessage(mediaMessage(sequence++, payload));
    }
  }

  function sendUtterance(): void {
    sendAudio([...Array<string>(6).fill(SPEECH_PAYLOAD), ...Array<string>(3).fill(SILENCE_PAYLOAD)]);
  }

  async function playReply(): Promise<void> {
    sendUtterance();
    transcriber.last.result.resolve('When do you close');
    await flushAsync();
    responder.last.result.resolve('We close at six.');
    await flushAsync();
  }

  it('should start a call session on the start event', () => {
    connection.handleMessage(JSON.stringify({ event: 'connected', protocol: 'Call', version: '1.0.0' }));
    connection.handleMessage(startMessage);

    expect(connection.activeCallId).toBe('CA-test');
    expect(controller.hasCall('CA-test')).toBe(true);
  });

  it('should drop media that arrives before start', () => {
    connection.handleMessage(mediaMessage(1, SPEECH_PAYLOAD));

    expect(controller.getStats().activeSessions).toBe(0);
    expect(connection.activeCallId).toBeNull();
  });

  it('should only route the inbound track', () => {
    connection.handleMessage(startMessage);
    connection.handleMessage(mediaMessage(1, SPEECH_PAYLOAD, 'outbound'));
    connection.handleMessage(mediaMessage(2, SPEECH_PAYLOAD));

    expect(registry.get('CA-test').metrics.framesReceived).toBe(1);
  });

  it('should ignore messages it cannot parse', () => {
    connection.handleMessage(startMessage);
    connection.handleMessage('not json');
    connection.handleMessage(JSON.stringify({ event: 'dtmf', dtmf: { digit: '1' } }));

    expect(registry.get('CA-test').state).toBe(CallState.IDLE);
  });

  it('should send the reply as media followed by a turn mark', async () => {
    connection.handleMessage(startMessage);
    await playReply();

    expect(socket.sent).toEqual([
      { event: 'media', streamSid: 'MZ-test', media: { payload: SILENCE_PAYLOAD } },
      { event: 'mark', streamSid: 'MZ-test', mark: { name: 'turn-1' } },
    ]);
    expect(registry.get('CA-test').state).toBe(CallState.SPEAKING);
  });

  it('should complete the turn when the carrier echoes the mark', async () => {
    connection.handleMessage(startMessage);
    await playReply();

    connection.handleMessage(JSON.stringify({ event: 'mark', streamSid: 'MZ-test', mark: { name: 'greeting' } }));
    expect(registry.get('CA-test').state).toBe(CallState.SPEAKING);

    connection.handleMessage(JSON.stringify({ event: 'mark', streamSid: 'MZ-test', mark: { name: 'turn-1' } }));
    expect(registry.get('CA-test').state).toBe(CallState.IDLE);
    expect(registry.get('CA-test').metrics.turnsCompleted).toBe(1);
  });

  it('should tell the carrier to clear playback on barge-in', async () => {
    connection.handleMessage(startMessage);
    await playReply();

    sendAudio([SPEECH_PAYLOAD, SPEECH_PAYLOAD]);
    await flushAsync();

    expect(socket.sent[socket.sent.length - 1]).toEqual({ event: 'clear', streamSid: 'MZ-test' });
    expect(registry.get('CA-test').state).toBe(CallState.LISTENING);
  });

  it('should end the call and stop pumping on stop', async () => {
    connection.handleMessage(startMessage);
    const session = registry.get('CA-test');

    connection.handleMessage(JSON.stringify({ event: 'stop', streamSid: 'MZ-test', stop: {} }));
    await connection.drained();

    expect(session.isEnded).toBe(true);
    expect(controller.hasCall('CA-test')).toBe(false);
    expect(connection.activeCallId).toBeNull();
  });

  it('should end the call when the socket closes', () => {
    connection.handleMessage(startMessage);
    connection.handleClose(1006);

    expect(controller.hasCall('CA-test')).toBe(false);
  });

  it('should close a second stream for the same call', () => {
    connection.handleMessage(startMessage);

    const otherSocket = new FakeMediaSocket();
    const other = new MediaStreamConnection(otherSocket, controller);
    other.handleMessage(startMessage);

    expect(otherSocket.closes).toEqual([{ code: DUPLICATE_CALL_CLOSE_CODE, reason: 'Duplicate call' }]);
    expect(other.activeCallId).toBeNull();
    expect(connection.activeCallId).toBe('CA-test');
  });
});
