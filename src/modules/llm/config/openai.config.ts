/**
 * OpenAI API Configuration
 * Model, temperature, timeout, and API settings
 */

export const openaiConfig = {
  // Model configuration
  model: process.env.LLM_MODEL || 'gpt-4o-mini',
  temperature: parseFloat(process.env.LLM_TEMPERATURE || '0.7'),
  maxTokens: parseInt(process.env.LLM_MAX_TOKENS || '300', 10),

  // Token streaming; when off the reply arrives as one string
  streaming: process.env.LLM_STREAMING !== 'false',

  // API configuration
  apiKey: process.env.OPENAI_API_KEY || '',
  timeout: parseInt(process.env.LLM_REQUEST_TIMEOUT || '30000', 10), // 30s
} as const;

export interface OpenAIResponseConfig {
  model: string;
  temperature: number;
  maxTokens: number;
  streaming: boolean;
  apiKey: string;
  timeout: number;
}

/**
 * Validate configuration
 */
export function validateOpenAIConfig(config: OpenAIResponseConfig): void {
  if (config.temperature < 0 || config.temperature > 2) {
    throw new Error('LLM_TEMPERATURE must be between 0 and 2');
  }
  if (config.maxTokens < 1 || config.maxTokens > 4096) {
    throw new Error('LLM_MAX_TOKENS must be between 1 and 4096');
  }
}
