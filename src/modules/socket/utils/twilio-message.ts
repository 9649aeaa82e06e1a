/**
 * Twilio message parsing
 * Narrows raw JSON text frames into typed inbound events. Anything that does
 * not match a known event shape yields null.
 */

import type { AudioEncoding } from '@/modules/audio';
import type { TwilioInboundEvent, TwilioOutboundMessage } from '../types';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

// Twilio sends counters as decimal strings
function readInteger(source: JsonObject, key: string): number | undefined {
  const value = source[key];
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return parseInt(value, 10);
  }
  return undefined;
}

function toEncoding(mediaFormat: unknown): AudioEncoding {
  if (isObject(mediaFormat) && readString(mediaFormat, 'encoding') === 'audio/l16') {
    return 'pcm16';
  }
  return 'mulaw';
}

export function parseTwilioMessage(raw: string): TwilioInboundEvent | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }

  if (!isObject(data)) {
    return null;
  }

  switch (data.event) {
    case 'connected':
      return { event: 'connected' };

    case 'start': {
      const start = data.start;
      if (!isObject(start)) return null;

      const callSid = readString(start, 'callSid');
      const streamSid = readString(start, 'streamSid') ?? readString(data, 'streamSid');
      if (!callSid || !streamSid) return null;

      const mediaFormat = start.mediaFormat;
      const sampleRate =
        (isObject(mediaFormat) ? readInteger(mediaFormat, 'sampleRate') : undefined) ?? 8000;

      return { event: 'start', callSid, streamSid, encoding: toEncoding(mediaFormat), sampleRate };
    }

    case 'media': {
      const media = data.media;
      if (!isObject(media)) return null;

      const payload = readString(media, 'payload');
      const sequence = readInteger(data, 'sequenceNumber');
      if (payload === undefined || sequence === undefined) return null;

      return { event: 'media', sequence, payload, track: readString(media, 'track') };
    }

    case 'mark': {
      const mark = data.mark;
      if (!isObject(mark)) return null;

      const name = readString(mark, 'name');
      return name ? { event: 'mark', name } : null;
    }

    case 'stop':
      return { event: 'stop' };

    default:
      return null;
  }
}

export function serializeTwilioMessage(message: TwilioOutboundMessage): string {
  return JSON.stringify(message);
}

/**
 * Mark names carry the generation id of the turn whose audio they follow
 */
export function turnMarkName(generationId: number): string {
  return `turn-${generationId}`;
}

export function parseTurnMark(name: string): number | null {
  const match = /^turn-(\d+)$/.exec(name);
  return match ? parseInt(match[1], 10) : null;
}
