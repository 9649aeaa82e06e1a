export { WebSocketUtils } from './WebSocketUtils';
export { encodeForCarrier } from './carrier-audio';
export {
  parseTwilioMessage,
  serializeTwilioMessage,
  turnMarkName,
  parseTurnMark,
} from './twilio-message';
