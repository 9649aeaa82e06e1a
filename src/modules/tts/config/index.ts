export { ttsConfig } from './openai-tts.config';
export type { SynthesisConfig } from './openai-tts.config';
export { ttsRetryConfig } from './retry.config';
export { TTS_CONSTANTS, SUPPORTED_VOICES } from './tts.constants';
