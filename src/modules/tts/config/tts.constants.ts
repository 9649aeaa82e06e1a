/**
 * TTS Constants
 */

export const TTS_CONSTANTS = {
  // Audio format (OpenAI speech `pcm` output)
  SAMPLE_RATE: 24000, // Hz
  CHANNELS: 1, // Mono
  BIT_DEPTH: 16, // 16-bit PCM little-endian

  // Maximum input length accepted by the speech endpoint
  MAX_TEXT_LENGTH: 4096,
} as const;

export const SUPPORTED_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
