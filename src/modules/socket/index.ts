/**
 * Socket Module - Public API
 * Twilio media stream transport and voice webhook
 */

export {
  initializeSocketServer,
  shutdownSocketServer,
  getSocketStats,
  handleConnection,
} from './socket.server';
export { MediaStreamConnection, DUPLICATE_CALL_CLOSE_CODE } from './services';
export { createTwilioRouter, buildStreamTwiml } from './routes/twilio.routes';
export type { TwilioRouterOptions } from './routes/twilio.routes';
export {
  parseTwilioMessage,
  serializeTwilioMessage,
  turnMarkName,
  parseTurnMark,
  encodeForCarrier,
  WebSocketUtils,
} from './utils';
export type { MediaSocket, SocketStats, TwilioInboundEvent, TwilioOutboundMessage } from './types';
