/**
 * Audio Processing Constants
 * Centralized audio configuration values
 */

/**
 * Sample rate of every frame inside the pipeline
 * Carrier audio is resampled to this rate before segmentation and transcription
 */
export const PIPELINE_SAMPLE_RATE = 16000;

/**
 * Twilio Media Streams audio: mu-law, 8kHz, mono, 20ms frames
 */
export const CARRIER_SAMPLE_RATE = 8000;
export const CARRIER_FRAME_MS = 20;
export const CARRIER_FRAME_BYTES = (CARRIER_SAMPLE_RATE * CARRIER_FRAME_MS) / 1000;

/**
 * Accepted resampling range
 */
export const MIN_SAMPLE_RATE = 8000;
export const MAX_SAMPLE_RATE = 48000;

export const BYTES_PER_SAMPLE = 2;
