/**
 * Audio Module
 * Frame decoding, resampling, voice activity detection and segmentation
 */

export * from './services';
export * from './types';
export * from './utils/pcm.utils';
export * from './constants/audio.constants';
export { segmentConfig, vadConfig } from './config/segment.config';
