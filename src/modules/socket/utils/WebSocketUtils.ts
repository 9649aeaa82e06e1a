/**
 * WebSocket utility functions for safe operations
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { logger } from '@/shared/utils';
import type { MediaSocket } from '../types';

export class WebSocketUtils {
  /**
   * Safely close a WebSocket connection with error handling
   */
  static safeClose(ws: WebSocket, label: string, code?: number, reason?: string): void {
    try {
      ws.close(code, reason);
    } catch (error) {
      logger.warn(`Error closing ${label} WebSocket`, { error });
    }
  }

  static canSend(ws: WebSocket): boolean {
    return ws.readyState === WebSocket.OPEN;
  }

  /**
   * Safely send data over WebSocket with error handling
   */
  static safeSend(ws: WebSocket, data: string, label: string): boolean {
    if (!this.canSend(ws)) {
      logger.debug(`Cannot send to ${label} WebSocket - not open`);
      return false;
    }

    try {
      ws.send(data);
      return true;
    } catch (error) {
      logger.error(`Error sending to ${label} WebSocket`, { error });
      return false;
    }
  }

  static toText(data: RawData): string {
    if (Buffer.isBuffer(data)) {
      return data.toString('utf8');
    }
    if (Array.isArray(data)) {
      return Buffer.concat(data).toString('utf8');
    }
    return Buffer.from(data).toString('utf8');
  }

  /**
   * Adapt a ws socket to the MediaSocket surface
   */
  static toMediaSocket(ws: WebSocket, label: string): MediaSocket {
    return {
      get isOpen() {
        return WebSocketUtils.canSend(ws);
      },
      send: (data) => WebSocketUtils.safeSend(ws, data, label),
      close: (code, reason) => WebSocketUtils.safeClose(ws, label, code, reason),
    };
  }
}
