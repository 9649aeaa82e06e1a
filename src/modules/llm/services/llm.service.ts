/**
 * LLM Service
 * OpenAI chat completions as the call pipeline's response generator
 *
 * Streaming mode returns a lazy sequence of text deltas so synthesis can
 * start on the first speakable fragment; otherwise the full reply is returned.
 */

import OpenAI from 'openai';
import type {
  ChatCompletionChunk,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { logger, isTurnCancelled, throwIfCancelled, withRetry } from '@/shared/utils';
import type { RetryOptions, RetryPolicy, TurnToken } from '@/shared/utils';
import { llmRetryConfig, openaiConfig, promptsConfig, validateOpenAIConfig } from '../config';
import type { OpenAIResponseConfig } from '../config';
import { GenerationError } from '../types';
import type { ConversationHistory, ResponseAdapter } from '../types';
import { classifyLLMError } from '../utils';

export interface LLMServiceOptions {
  openai?: Partial<OpenAIResponseConfig>;
  retry?: RetryPolicy;
  systemPrompt?: string;
}

export class LLMServiceClass implements ResponseAdapter {
  private readonly config: OpenAIResponseConfig;
  private readonly retry: RetryPolicy;
  private readonly systemPrompt: string;
  private client: OpenAI | null = null;

  constructor(options: LLMServiceOptions = {}) {
    this.config = { ...openaiConfig, ...options.openai };
    this.retry = options.retry ?? llmRetryConfig;
    this.systemPrompt = options.systemPrompt ?? promptsConfig.systemPrompt;

    // Validate configuration
    validateOpenAIConfig(this.config);

    if (!this.config.apiKey) {
      logger.warn('OPENAI_API_KEY not set, LLM service will not function');
    }
  }

  async generate(
    history: ConversationHistory,
    token: TurnToken
  ): Promise<string | AsyncIterable<string>> {
    throwIfCancelled(token);
    const messages = this.buildMessages(history);

    logger.debug('Requesting reply', {
      callId: token.callId,
      generationId: token.generationId,
      model: this.config.model,
      turns: history.length,
      streaming: this.config.streaming,
    });

    try {
      const client = this.getClient();

      if (this.config.streaming) {
        const stream = await withRetry(
          () =>
            client.chat.completions.create(
              {
                model: this.config.model,
                messages,
                temperature: this.config.temperature,
                max_tokens: this.config.maxTokens,
                stream: true,
              },
              { signal: token.signal }
            ),
          token,
          this.retryOptions()
        );
        return this.readStream(stream, token);
      }

      const completion = await withRetry(
        () =>
          client.chat.completions.create(
            {
              model: this.config.model,
              messages,
              temperature: this.config.temperature,
              max_tokens: this.config.maxTokens,
            },
            { signal: token.signal }
          ),
        token,
        this.retryOptions()
      );

      const text = completion.choices[0]?.message?.content?.trim() ?? '';
      if (!text) {
        throw new GenerationError('OpenAI returned an empty reply');
      }
      return text;
    } catch (error) {
      throw this.toGenerationError(error);
    }
  }

  /**
   * System prompt first, then every turn in order
   */
  buildMessages(history: ConversationHistory): ChatCompletionMessageParam[] {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: this.systemPrompt },
    ];

    for (const turn of history) {
      messages.push(
        turn.speaker === 'user'
          ? { role: 'user', content: turn.text }
          : { role: 'assistant', content: turn.text }
      );
    }

    return messages;
  }

  private async *readStream(
    stream: AsyncIterable<ChatCompletionChunk>,
    token: TurnToken
  ): AsyncGenerator<string> {
    try {
      for await (const chunk of stream) {
        throwIfCancelled(token);
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    } catch (error) {
      throw this.toGenerationError(error);
    }
  }

  private retryOptions(): RetryOptions {
    return {
      ...this.retry,
      operation: 'openai completion',
      isRetryable: (error) => classifyLLMError(error).isRetryable,
    };
  }

  /**
   * Cancellation passes through untouched; everything else becomes GenerationError
   */
  private toGenerationError(error: unknown): unknown {
    if (isTurnCancelled(error) || error instanceof GenerationError) {
      return error;
    }
    const classified = classifyLLMError(error);
    return new GenerationError(`Generation failed: ${classified.message}`, {
      cause: error,
      retryable: classified.isRetryable,
    });
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new GenerationError('OPENAI_API_KEY is not configured');
      }
      // Initialize OpenAI client
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        timeout: this.config.timeout,
        maxRetries: 0,
      });

      logger.info('LLM client initialized', {
        model: this.config.model,
        temperature: this.config.temperature,
      });
    }
    return this.client;
  }
}

// Export singleton instance
export const llmService = new LLMServiceClass();
