export { openaiConfig, validateOpenAIConfig } from './openai.config';
export type { OpenAIResponseConfig } from './openai.config';
export { promptsConfig } from './prompts.config';
export { llmRetryConfig } from './retry.config';
export { streamingConfig } from './streaming.config';
export type { StreamingConfig } from './streaming.config';
