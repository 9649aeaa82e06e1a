/**
 * LLM Utilities
 * Export barrel for LLM utility functions
 */

export { classifyLLMError, LLMErrorType, type ClassifiedLLMError } from './error-classifier';
