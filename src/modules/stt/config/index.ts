export { deepgramConfig } from './deepgram.config';
export type { DeepgramTranscriptionConfig } from './deepgram.config';
export { sttRetryConfig } from './retry.config';
