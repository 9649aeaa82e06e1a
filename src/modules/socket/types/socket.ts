/**
 * Socket types
 */

import type { IncomingMessage } from 'http';

/**
 * The slice of a WebSocket a media stream connection writes to
 */
export interface MediaSocket {
  readonly isOpen: boolean;
  send(data: string): boolean;
  close(code?: number, reason?: string): void;
}

export type WebSocketUpgradeRequest = IncomingMessage;

export interface SocketStats {
  totalConnections: number;
  activeCalls: number;
}
