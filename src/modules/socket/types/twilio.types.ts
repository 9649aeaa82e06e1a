/**
 * Twilio Media Streams message types
 * Inbound events arrive as JSON text frames; outbound messages are the
 * media, mark and clear commands Twilio accepts on a bidirectional stream.
 */

import type { AudioEncoding } from '@/modules/audio';

export interface ConnectedEvent {
  event: 'connected';
}

export interface StartEvent {
  event: 'start';
  streamSid: string;
  callSid: string;
  encoding: AudioEncoding;
  sampleRate: number;
}

export interface MediaEvent {
  event: 'media';
  sequence: number;
  track?: string;
  payload: string;
}

export interface MarkEvent {
  event: 'mark';
  name: string;
}

export interface StopEvent {
  event: 'stop';
}

export type TwilioInboundEvent = ConnectedEvent | StartEvent | MediaEvent | MarkEvent | StopEvent;

export type TwilioOutboundMessage =
  | { event: 'media'; streamSid: string; media: { payload: string } }
  | { event: 'mark'; streamSid: string; mark: { name: string } }
  | { event: 'clear'; streamSid: string };
