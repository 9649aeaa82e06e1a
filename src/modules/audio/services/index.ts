export { audioResamplerService, AudioResamplerServiceClass } from './audio-resampler.service';
export { AudioFrameDecoder, audioFrameDecoder } from './frame-decoder.service';
export type { FrameDecoderOptions } from './frame-decoder.service';
export { EnergyVoiceActivityDetector } from './vad.service';
export { SegmentBuffer, utteranceSamples } from './segment-buffer.service';
