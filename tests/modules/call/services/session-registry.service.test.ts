import { afterEach, describe, expect, it } from 'vitest';
import { CallSession, CallState, DuplicateSessionError, SessionRegistry, UnknownSessionError } from '@/modules/call';
import { FakeResponder, FakeSynthesizer, FakeTranscriber, testCallConfig } from '../../../helpers/fakes';
import { makeFrame } from '../../../helpers/audio';

function createRegistry(): SessionRegistry {
  return new SessionRegistry(
    (callId) =>
      new CallSession(
        callId,
        {
          transcriber: new FakeTranscriber(),
          responder: new FakeResponder(),
          synthesizer: new FakeSynthesizer(),
        },
        testCallConfig
      )
  );
}

describe('SessionRegistry', () => {
  let registry: SessionRegistry;

  afterEach(() => {
    registry.shutdown();
  });

  it('should create and look up sessions by call id', () => {
    registry = createRegistry();
    const session = registry.create('CA-1');

    expect(session.id).toBe('CA-1');
    expect(registry.get('CA-1')).toBe(session);
    expect(registry.find('CA-1')).toBe(session);
    expect(registry.has('CA-1')).toBe(true);
    expect(registry.size).toBe(1);
  });

  it('should reject a second session for the same call', () => {
    registry = createRegistry();
    const first = registry.create('CA-1');

    expect(() => registry.create('CA-1')).toThrow(DuplicateSessionError);
    expect(registry.get('CA-1')).toBe(first);
  });

  it('should report unknown calls', () => {
    registry = createRegistry();

    expect(() => registry.get('CA-missing')).toThrow(UnknownSessionError);
    expect(() => registry.remove('CA-missing')).toThrow(UnknownSessionError);
    expect(registry.find('CA-missing')).toBeUndefined();
  });

  it('should keep concurrently created sessions distinct', async () => {
    registry = createRegistry();
    const ids = Array.from({ length: 20 }, (_, index) => `CA-${index}`);

    const sessions = await Promise.all(ids.map(async (id) => registry.create(id)));

    expect(new Set(sessions).size).toBe(20);
    expect(registry.ids().sort()).toEqual([...ids].sort());
    for (const id of ids) {
      expect(registry.get(id).id).toBe(id);
    }
  });

  it('should end a session when removing it', () => {
    registry = createRegistry();
    const session = registry.create('CA-1');

    registry.remove('CA-1', 'caller hung up');

    expect(session.isEnded).toBe(true);
    expect(session.outbound.isClosed).toBe(true);
    expect(registry.has('CA-1')).toBe(false);
  });

  it('should count sessions by state', () => {
    registry = createRegistry();
    registry.create('CA-1');
    const listening = registry.create('CA-2');
    listening.onAudioFrame(makeFrame(0, true));
    listening.onAudioFrame(makeFrame(1, true));

    const stats = registry.getStats();

    expect(stats.activeSessions).toBe(2);
    expect(stats.byState[CallState.IDLE]).toBe(1);
    expect(stats.byState[CallState.LISTENING]).toBe(1);
    expect(stats.byState[CallState.SPEAKING]).toBe(0);
  });

  it('should end every session on shutdown', () => {
    registry = createRegistry();
    const sessions = [registry.create('CA-1'), registry.create('CA-2')];

    expect(registry.shutdown('server stopping')).toBe(2);
    expect(sessions.every((session) => session.isEnded)).toBe(true);
    expect(registry.size).toBe(0);
    expect(registry.shutdown()).toBe(0);
  });
});
