/**
 * STT Service
 * Deepgram pre-recorded transcription of closed utterances
 */

import { createClient } from '@deepgram/sdk';
import type { DeepgramClient } from '@deepgram/sdk';
import {
  logger,
  isTurnCancelled,
  raceWithAbort,
  throwIfCancelled,
  withRetry,
} from '@/shared/utils';
import type { RetryPolicy, TurnToken } from '@/shared/utils';
import { samplesToBuffer, utteranceSamples, wrapInWav } from '@/modules/audio';
import type { Utterance } from '@/modules/audio';
import { deepgramConfig, sttRetryConfig } from '../config';
import type { DeepgramTranscriptionConfig } from '../config';
import { TranscriptionError } from '../types';
import type { TranscriptionAdapter } from '../types';
import { classifyDeepgramError } from '../utils/error-classifier';

export interface STTServiceOptions {
  deepgram?: Partial<DeepgramTranscriptionConfig>;
  retry?: RetryPolicy;
}

export class STTService implements TranscriptionAdapter {
  private readonly config: DeepgramTranscriptionConfig;
  private readonly retry: RetryPolicy;
  private client: DeepgramClient | null = null;

  constructor(options: STTServiceOptions = {}) {
    this.config = { ...deepgramConfig, ...options.deepgram };
    this.retry = options.retry ?? sttRetryConfig;
    if (!this.config.apiKey) {
      logger.warn('DEEPGRAM_API_KEY not set, STT service will not function');
    }
  }

  async transcribe(utterance: Utterance, token: TurnToken): Promise<string> {
    throwIfCancelled(token);

    const client = this.getClient();
    const wav = wrapInWav(samplesToBuffer(utteranceSamples(utterance)), utterance.sampleRate);
    const startTime = Date.now();

    try {
      const transcript = await withRetry(
        () => raceWithAbort(this.request(client, wav), token),
        token,
        {
          ...this.retry,
          operation: 'deepgram transcription',
          isRetryable: (error) => classifyDeepgramError(error).retryable,
        }
      );

      logger.info('Utterance transcribed', {
        callId: token.callId,
        generationId: token.generationId,
        utteranceId: utterance.id,
        durationMs: utterance.durationMs,
        latencyMs: Date.now() - startTime,
        characters: transcript.length,
      });

      return transcript;
    } catch (error) {
      if (isTurnCancelled(error) || error instanceof TranscriptionError) {
        throw error;
      }
      const classified = classifyDeepgramError(error);
      throw new TranscriptionError(`Transcription failed: ${classified.message}`, {
        cause: error,
        retryable: classified.retryable,
      });
    }
  }

  private async request(client: DeepgramClient, wav: Buffer): Promise<string> {
    const response = await client.listen.prerecorded.transcribeFile(wav, {
      model: this.config.model,
      language: this.config.language,
      smart_format: this.config.smartFormat,
      punctuate: this.config.punctuate,
    });

    const result = response.result;
    if (!result) {
      throw response.error ?? new Error('Deepgram returned an empty response');
    }

    return (result.results.channels[0]?.alternatives[0]?.transcript ?? '').trim();
  }

  private getClient(): DeepgramClient {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new TranscriptionError('DEEPGRAM_API_KEY is not configured');
      }
      this.client = createClient(this.config.apiKey);
    }
    return this.client;
  }
}

// Export singleton instance
export const sttService = new STTService();
