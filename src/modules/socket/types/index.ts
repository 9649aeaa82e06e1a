export type { MediaSocket, SocketStats, WebSocketUpgradeRequest } from './socket';
export type {
  ConnectedEvent,
  MarkEvent,
  MediaEvent,
  StartEvent,
  StopEvent,
  TwilioInboundEvent,
  TwilioOutboundMessage,
} from './twilio.types';
