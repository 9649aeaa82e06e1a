/**
 * Audio fixtures shared by the pipeline tests
 */

import type { AudioFrame } from '@/modules/audio';

export const SPEECH_LEVEL = 1000;

/**
 * A 20ms frame at 16kHz; speech frames hold a constant level well above
 * the default VAD threshold, silence frames are all zero
 */
export function makeFrame(sequence: number, speech: boolean): AudioFrame {
  return {
    sequence,
    samples: new Int16Array(320).fill(speech ? SPEECH_LEVEL : 0),
    sampleRate: 16000,
    durationMs: 20,
  };
}

/**
 * Frames for a pattern such as [false×5, true×10, false×8], numbered from `start`
 */
export function makeFrames(pattern: boolean[], start = 0): AudioFrame[] {
  return pattern.map((speech, index) => makeFrame(start + index, speech));
}

export function repeat(speech: boolean, count: number): boolean[] {
  return Array.from({ length: count }, () => speech);
}

/**
 * Base64 mu-law payload of one 20ms carrier frame (160 bytes)
 */
export function mulawPayload(byte: number, length = 160): string {
  return Buffer.alloc(length, byte).toString('base64');
}

// 0xFF decodes to 0, 0xCE decodes to 988
export const SILENCE_PAYLOAD = mulawPayload(0xff);
export const SPEECH_PAYLOAD = mulawPayload(0xce);
