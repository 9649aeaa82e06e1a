/**
 * TTS Service
 * OpenAI speech synthesis of reply text into raw PCM16 (24kHz mono)
 *
 * The synthesized audio is returned as a lazy sequence of fixed-duration
 * chunks so the call can queue audio without holding the whole reply.
 */

import OpenAI from 'openai';
import type { SpeechCreateParams } from 'openai/resources/audio/speech';
import {
  logger,
  isTurnCancelled,
  raceWithAbort,
  throwIfCancelled,
  withRetry,
} from '@/shared/utils';
import type { RetryPolicy, TurnToken } from '@/shared/utils';
import { splitIntoChunks } from '@/modules/audio';
import { SUPPORTED_VOICES, TTS_CONSTANTS, ttsConfig, ttsRetryConfig } from '../config';
import type { SynthesisConfig } from '../config';
import { SynthesisError } from '../types';
import type { SynthesisAdapter } from '../types';
import { classifySynthesisError, isFatalError } from '../utils/error-classifier';

type Voice = SpeechCreateParams['voice'];

function isSupportedVoice(voice: string): voice is Voice {
  return SUPPORTED_VOICES.some((supported) => supported === voice);
}

export interface TTSServiceOptions {
  synthesis?: Partial<SynthesisConfig>;
  retry?: RetryPolicy;
}

export class TTSService implements SynthesisAdapter {
  readonly sampleRate = TTS_CONSTANTS.SAMPLE_RATE;

  private readonly config: SynthesisConfig;
  private readonly retry: RetryPolicy;
  private readonly voice: Voice;
  private client: OpenAI | null = null;

  constructor(options: TTSServiceOptions = {}) {
    this.config = { ...ttsConfig, ...options.synthesis };
    this.retry = options.retry ?? ttsRetryConfig;

    if (!isSupportedVoice(this.config.voice)) {
      throw new Error(
        `TTS_VOICE must be one of ${SUPPORTED_VOICES.join(', ')}, got "${this.config.voice}"`
      );
    }
    this.voice = this.config.voice;

    if (this.config.chunkMs <= 0) {
      throw new Error('TTS_CHUNK_MS must be positive');
    }
  }

  /**
   * Bytes of PCM16 audio per emitted chunk
   */
  get chunkBytes(): number {
    return Math.round((this.sampleRate * this.config.chunkMs) / 1000) * 2;
  }

  async synthesize(text: string, token: TurnToken): Promise<AsyncIterable<Buffer>> {
    throwIfCancelled(token);

    const input = text.trim();
    if (!input) {
      throw new SynthesisError('Cannot synthesize empty text');
    }
    if (input.length > TTS_CONSTANTS.MAX_TEXT_LENGTH) {
      throw new SynthesisError(
        `Text exceeds ${TTS_CONSTANTS.MAX_TEXT_LENGTH} characters (${input.length})`
      );
    }

    const client = this.getClient();
    const startTime = Date.now();

    try {
      const audio = await withRetry(() => raceWithAbort(this.request(client, input, token), token), token, {
        ...this.retry,
        operation: 'openai speech',
        isRetryable: (error) => !isFatalError(classifySynthesisError(error)),
      });

      logger.debug('Text synthesized', {
        callId: token.callId,
        generationId: token.generationId,
        characters: input.length,
        bytes: audio.length,
        latencyMs: Date.now() - startTime,
      });

      return this.streamChunks(audio, token);
    } catch (error) {
      if (isTurnCancelled(error) || error instanceof SynthesisError) {
        throw error;
      }
      const classified = classifySynthesisError(error);
      throw new SynthesisError(`Synthesis failed: ${classified.message}`, {
        cause: error,
        retryable: classified.retryable,
      });
    }
  }

  private async request(client: OpenAI, input: string, token: TurnToken): Promise<Buffer> {
    const response = await client.audio.speech.create(
      {
        model: this.config.model,
        voice: this.voice,
        input,
        response_format: 'pcm',
        speed: this.config.speed,
      },
      { signal: token.signal }
    );

    const audio = Buffer.from(await response.arrayBuffer());
    if (audio.length === 0) {
      throw new SynthesisError('Speech endpoint returned no audio');
    }
    return audio;
  }

  private async *streamChunks(audio: Buffer, token: TurnToken): AsyncGenerator<Buffer> {
    for (const chunk of splitIntoChunks(audio, this.chunkBytes)) {
      throwIfCancelled(token);
      yield chunk;
    }
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new SynthesisError('OPENAI_API_KEY is not configured');
      }
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        timeout: this.config.timeout,
        maxRetries: 0,
      });
    }
    return this.client;
  }
}

// Export singleton instance
export const ttsService = new TTSService();
