/**
 * Speech Fragment Configuration
 *
 * Controls how streamed reply text is grouped before synthesis.
 * Kept in code rather than env for consistency across environments.
 */

export const streamingConfig = {
  /**
   * Minimum words before a sentence boundary ends a fragment
   */
  minChunkWords: 5,

  /**
   * A fragment is cut at this many words even without punctuation
   */
  maxChunkWords: 40,

  /**
   * Log preview length for fragment text (characters)
   */
  logPreviewLength: 50,
} as const;

export type StreamingConfig = {
  minChunkWords: number;
  maxChunkWords: number;
  logPreviewLength: number;
};
