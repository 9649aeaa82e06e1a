/**
 * TTS Module Public Exports
 */

export { ttsService, TTSService } from './services/tts.service';
export type { TTSServiceOptions } from './services/tts.service';
export { SynthesisError, TTSErrorType } from './types';
export type { ClassifiedError, SynthesisAdapter } from './types';
export { classifySynthesisError, isFatalError } from './utils/error-classifier';
