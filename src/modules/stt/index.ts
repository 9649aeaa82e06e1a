/**
 * STT Module Public Exports
 */

export { sttService, STTService } from './services/stt.service';
export type { STTServiceOptions } from './services/stt.service';
export { TranscriptionError } from './types';
export type { TranscriptionAdapter } from './types';
export { classifyDeepgramError, ErrorType, isFatalError, isRetryableError } from './utils/error-classifier';
