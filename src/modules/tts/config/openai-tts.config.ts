/**
 * OpenAI Speech Configuration
 */

export const ttsConfig = {
  apiKey: process.env.OPENAI_API_KEY || '',
  model: process.env.TTS_MODEL || 'tts-1',
  voice: process.env.TTS_VOICE || 'alloy',
  speed: parseFloat(process.env.TTS_SPEED || '1.0'),

  // Synthesized audio is handed to the call in chunks of this duration
  chunkMs: parseInt(process.env.TTS_CHUNK_MS || '100', 10),
  timeout: parseInt(process.env.TTS_REQUEST_TIMEOUT || '20000', 10),
} as const;

export interface SynthesisConfig {
  apiKey: string;
  model: string;
  voice: string;
  speed: number;
  chunkMs: number;
  timeout: number;
}
