/**
 * TTSService Tests
 * OpenAI speech synthesis with the SDK mocked out
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SynthesisError, TTSService } from '@/modules/tts';
import type { TTSServiceOptions } from '@/modules/tts';
import { TurnCancelledError } from '@/shared/utils';
import { abortedToken, collectAudio, httpError, makeToken } from '../../../helpers/tokens';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    audio = { speech: { create } };
  },
}));

function speechResponse(bytes: number) {
  return { arrayBuffer: async () => new Uint8Array(bytes).fill(7).buffer };
}

function createService(overrides: TTSServiceOptions['synthesis'] = {}): TTSService {
  return new TTSService({
    synthesis: {
      apiKey: 'test-secret',
      model: 'tts-1',
      voice: 'alloy',
      speed: 1,
      chunkMs: 100,
      ...overrides,
    },
    retry: { maxRetries: 1, baseDelay: 1, maxDelay: 1 },
  });
}

describe('TTSService', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('should report 24kHz output and 100ms chunks', () => {
    const service = createService();

    expect(service.sampleRate).toBe(24000);
    expect(service.chunkBytes).toBe(4800);
  });

  it('should request raw PCM and split it into chunks', async () => {
    create.mockResolvedValue(speechResponse(10000));
    const token = makeToken();

    const audio = await createService().synthesize('  Hello there ', token);
    const chunks = await collectAudio(audio);

    expect(chunks.map((chunk) => chunk.length)).toEqual([4800, 4800, 400]);
    expect(create).toHaveBeenCalledWith(
      { model: 'tts-1', voice: 'alloy', input: 'Hello there', response_format: 'pcm', speed: 1 },
      { signal: token.signal }
    );
  });

  it('should reject empty and oversized text without calling the API', async () => {
    const service = createService();

    await expect(service.synthesize('   ', makeToken())).rejects.toBeInstanceOf(SynthesisError);
    await expect(service.synthesize('a'.repeat(4097), makeToken())).rejects.toThrow(
      'exceeds 4096 characters'
    );
    expect(create).not.toHaveBeenCalled();
  });

  it('should retry transient failures', async () => {
    create
      .mockRejectedValueOnce(new Error('Connection error.'))
      .mockResolvedValueOnce(speechResponse(4800));

    const chunks = await collectAudio(await createService().synthesize('Hi', makeToken()));

    expect(chunks).toHaveLength(1);
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('should not retry authentication failures', async () => {
    create.mockRejectedValue(httpError(401, 'Unauthorized'));

    const failure = createService().synthesize('Hi', makeToken());

    await expect(failure).rejects.toMatchObject({ code: 'SYNTHESIS_FAILED', retryable: false });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('should fail when the endpoint returns no audio', async () => {
    create.mockResolvedValue(speechResponse(0));

    await expect(
      createService().synthesize('Hi', makeToken())
    ).rejects.toThrow('Speech endpoint returned no audio');
  });

  it('should stop yielding chunks once the turn is cancelled', async () => {
    create.mockResolvedValue(speechResponse(10000));
    const controller = new AbortController();

    const audio = await createService().synthesize('Hello', makeToken(controller));
    controller.abort();

    await expect(collectAudio(audio)).rejects.toBeInstanceOf(TurnCancelledError);
  });

  it('should not call the API for a cancelled turn', async () => {
    await expect(createService().synthesize('Hi', abortedToken())).rejects.toBeInstanceOf(
      TurnCancelledError
    );
    expect(create).not.toHaveBeenCalled();
  });

  it('should reject unsupported voices and chunk sizes', () => {
    expect(() => createService({ voice: 'robot' })).toThrow('TTS_VOICE must be one of');
    expect(() => createService({ chunkMs: 0 })).toThrow('TTS_CHUNK_MS must be positive');
  });

  it('should refuse to run without an API key', async () => {
    await expect(createService({ apiKey: '' }).synthesize('Hi', makeToken())).rejects.toThrow(
      'OPENAI_API_KEY is not configured'
    );
  });
});
