/**
 * LLM Module Type Definitions
 */

import type { TurnToken } from '@/shared/utils';

export type Speaker = 'user' | 'assistant';

/**
 * One exchange in a call; frozen once appended to a history
 */
export interface ConversationTurn {
  readonly speaker: Speaker;
  readonly text: string;
  readonly timestamp: number;
}

/**
 * Append-only, owned by a single call session
 */
export type ConversationHistory = readonly ConversationTurn[];

/**
 * Produces the assistant's reply to the conversation so far.
 * Either the full text or a lazy sequence of text pieces.
 * Rejects (or throws while iterating) with GenerationError.
 */
export interface ResponseAdapter {
  generate(history: ConversationHistory, token: TurnToken): Promise<string | AsyncIterable<string>>;
}

/**
 * Speakable fragment produced by the chunker
 */
export interface SpeechFragment {
  text: string;
  wordCount: number;
  reason: 'sentence' | 'word-limit' | 'flush';
}

export { GenerationError } from './error.types';
