/**
 * LLM Module Public Exports
 */

export { llmService, LLMServiceClass, SpeechFragmentChunker, countWords } from './services';
export type { LLMServiceOptions } from './services';
export { GenerationError } from './types';
export type {
  ConversationHistory,
  ConversationTurn,
  ResponseAdapter,
  Speaker,
  SpeechFragment,
} from './types';
export { classifyLLMError, LLMErrorType } from './utils';
