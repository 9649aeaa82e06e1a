/**
 * WebSocket Configuration
 */

/**
 * Media stream server configuration
 */
export const websocketConfig = {
  // Path Twilio connects the bidirectional stream to
  path: process.env.MEDIA_STREAM_PATH || '/media',

  // Media messages are small JSON frames (20ms of base64 audio)
  maxPayload: 64 * 1024,

  perMessageDeflate: false,

  clientTracking: true,
} as const;

/**
 * WebSocket server shutdown configuration
 */
export const websocketShutdownConfig = {
  // Timeout for graceful shutdown (milliseconds)
  shutdownTimeout: parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '5000', 10),
} as const;
