/**
 * Twilio Voice Webhook
 * Answers an incoming call with TwiML that connects a bidirectional media
 * stream back to this server.
 */

import { Router } from 'express';
import type { Request } from 'express';
import { logger } from '@/shared/utils';
import { websocketConfig } from '@/shared/config';

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * A greeting is spoken before `<Connect>`, which holds the call until the stream closes
 */
export function buildStreamTwiml(
  host: string,
  path: string = websocketConfig.path,
  greeting?: string
): string {
  const say = greeting ? `<Say>${escapeXml(greeting)}</Say>` : '';
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<Response>${say}<Connect><Stream url="wss://${escapeXml(host)}${escapeXml(path)}"/></Connect></Response>`
  );
}

function readBodyField(body: unknown, key: string): string | undefined {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : undefined;
}

export interface TwilioRouterOptions {
  /** Host advertised in the stream URL; falls back to the request's Host header */
  publicHost?: string;
  /** Spoken to the caller while the stream connects */
  greeting?: string;
}

export function createTwilioRouter(options: TwilioRouterOptions = {}): Router {
  const router = Router();

  router.post('/incoming', (req: Request, res) => {
    const host = options.publicHost || req.headers.host;
    if (!host) {
      res.status(400).send('Missing host');
      return;
    }

    logger.info('Incoming call', {
      callId: readBodyField(req.body, 'CallSid'),
      from: readBodyField(req.body, 'From'),
    });

    res.type('text/xml').send(buildStreamTwiml(host, websocketConfig.path, options.greeting));
  });

  return router;
}
