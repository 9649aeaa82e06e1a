/**
 * Deepgram Configuration
 * Pre-recorded transcription of closed utterances
 */

export const deepgramConfig = {
  apiKey: process.env.DEEPGRAM_API_KEY || '',

  // Model Selection
  model: process.env.STT_MODEL || 'nova-2',
  language: process.env.STT_LANGUAGE || 'en-US',

  // Features
  smartFormat: true,
  punctuate: true,
} as const;

export interface DeepgramTranscriptionConfig {
  apiKey: string;
  model: string;
  language: string;
  smartFormat: boolean;
  punctuate: boolean;
}
