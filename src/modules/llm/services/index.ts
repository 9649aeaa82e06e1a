export { llmService, LLMServiceClass } from './llm.service';
export type { LLMServiceOptions } from './llm.service';
export { SpeechFragmentChunker, countWords } from './llm-streaming.service';
