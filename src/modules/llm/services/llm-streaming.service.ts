/**
 * LLM Streaming Service
 * Groups streamed reply text into speakable fragments
 *
 * A fragment ends at:
 * - a sentence boundary once it holds at least `minChunkWords` words
 * - `maxChunkWords` words, for replies without punctuation
 * Whatever is left when the stream ends is returned by flush().
 */

import { logger } from '@/shared/utils';
import { streamingConfig } from '../config/streaming.config';
import type { StreamingConfig } from '../config/streaming.config';
import type { SpeechFragment } from '../types';

// Sentence punctuation that is followed by whitespace (so "3.5" never splits)
const SENTENCE_BOUNDARY = /[.!?…]+["')\]]*(?=\s)/g;

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export class SpeechFragmentChunker {
  private buffer = '';
  private readonly config: StreamingConfig;
  private fragmentCount = 0;

  constructor(config: Partial<StreamingConfig> = {}) {
    this.config = { ...streamingConfig, ...config };
  }

  /**
   * Text received but not yet emitted
   */
  get pending(): string {
    return this.buffer;
  }

  get emittedCount(): number {
    return this.fragmentCount;
  }

  /**
   * Add streamed text; returns fragments completed by it, in order
   */
  push(text: string): string[] {
    this.buffer += text;
    const fragments: SpeechFragment[] = [];

    let fragment = this.takeNext();
    while (fragment) {
      fragments.push(fragment);
      fragment = this.takeNext();
    }

    return fragments.map((item) => this.emit(item));
  }

  /**
   * Emit whatever remains once the stream has ended
   */
  flush(): string | null {
    const rest = this.buffer.trim();
    this.buffer = '';
    if (!rest) {
      return null;
    }
    return this.emit({ text: rest, wordCount: countWords(rest), reason: 'flush' });
  }

  reset(): void {
    this.buffer = '';
    this.fragmentCount = 0;
  }

  private takeNext(): SpeechFragment | null {
    return this.takeSentence() ?? this.takeAtWordLimit();
  }

  private takeSentence(): SpeechFragment | null {
    const boundary = new RegExp(SENTENCE_BOUNDARY.source, 'g');
    let match = boundary.exec(this.buffer);

    while (match) {
      const end = match.index + match[0].length;
      const candidate = this.buffer.slice(0, end);
      const wordCount = countWords(candidate);
      if (wordCount >= this.config.minChunkWords) {
        this.buffer = this.buffer.slice(end);
        return { text: candidate.trim(), wordCount, reason: 'sentence' };
      }
      match = boundary.exec(this.buffer);
    }

    return null;
  }

  private takeAtWordLimit(): SpeechFragment | null {
    const limit = new RegExp(`^\\s*(?:\\S+\\s+){${this.config.maxChunkWords}}`);
    const match = limit.exec(this.buffer);
    if (!match) {
      return null;
    }
    this.buffer = this.buffer.slice(match[0].length);
    const text = match[0].trim();
    return { text, wordCount: countWords(text), reason: 'word-limit' };
  }

  private emit(fragment: SpeechFragment): string {
    this.fragmentCount++;
    logger.debug('Speech fragment ready', {
      fragment: this.fragmentCount,
      reason: fragment.reason,
      words: fragment.wordCount,
      preview: fragment.text.slice(0, this.config.logPreviewLength),
    });
    return fragment.text;
  }
}
