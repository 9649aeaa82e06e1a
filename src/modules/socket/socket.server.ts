/**
 * Media Stream WebSocket Server
 * Accepts Twilio bidirectional media streams on the configured path
 */

import { WebSocketServer } from 'ws';
import type { RawData, WebSocket } from 'ws';
import type { Server as HTTPServer } from 'http';
import { logger } from '@/shared/utils';
import { websocketShutdownConfig, websocketConfig } from '@/shared/config';
import { callController } from '@/modules/call';
import type { CallController } from '@/modules/call';
import type { SocketStats, WebSocketUpgradeRequest } from './types';
import { MediaStreamConnection } from './services';
import { WebSocketUtils } from './utils';

/**
 * Initialize WebSocket server
 */
export function initializeSocketServer(
  httpServer: HTTPServer,
  controller: CallController = callController
): WebSocketServer {
  logger.info('Initializing media stream server', { path: websocketConfig.path });

  const wss = new WebSocketServer({
    server: httpServer,
    path: websocketConfig.path,
    maxPayload: websocketConfig.maxPayload,
    perMessageDeflate: websocketConfig.perMessageDeflate,
    clientTracking: websocketConfig.clientTracking,
  });

  wss.on('connection', (ws: WebSocket, request: WebSocketUpgradeRequest) => {
    handleConnection(ws, request, controller);
  });

  wss.on('error', (error: Error) => {
    logger.error('WebSocket server error', error);
  });

  return wss;
}

export function handleConnection(
  ws: WebSocket,
  request: WebSocketUpgradeRequest,
  controller: CallController
): MediaStreamConnection {
  const connection = new MediaStreamConnection(
    WebSocketUtils.toMediaSocket(ws, 'media stream'),
    controller
  );

  logger.info('Media stream client connected', {
    connectionId: connection.connectionId,
    clientIP: request.socket.remoteAddress || 'unknown',
  });

  ws.on('message', (data: RawData, isBinary: boolean) => {
    if (isBinary) {
      logger.warn('Binary frame on media stream ignored', {
        connectionId: connection.connectionId,
      });
      return;
    }

    try {
      connection.handleMessage(WebSocketUtils.toText(data));
    } catch (error) {
      logger.error('Error handling media stream message', {
        connectionId: connection.connectionId,
        callId: connection.activeCallId,
        error,
      });
    }
  });

  ws.on('close', (code: number) => {
    logger.info('Media stream client disconnected', {
      connectionId: connection.connectionId,
      callId: connection.activeCallId,
      code,
    });
    connection.handleClose(code);
  });

  ws.on('error', (error: Error) => {
    logger.error('Media stream socket error', {
      connectionId: connection.connectionId,
      error,
    });
  });

  return connection;
}

/**
 * Get socket server statistics
 * Exposed for health checks and monitoring
 */
export function getSocketStats(
  wss: WebSocketServer,
  controller: CallController = callController
): SocketStats {
  return {
    totalConnections: wss.clients.size,
    activeCalls: controller.getStats().activeSessions,
  };
}

/**
 * Graceful shutdown for WebSocket server
 */
export async function shutdownSocketServer(wss: WebSocketServer): Promise<void> {
  logger.info('Shutting down WebSocket server');

  const closeAll = Promise.all(
    [...wss.clients].map(
      (ws) =>
        new Promise<void>((resolve) => {
          ws.once('close', () => resolve());
          WebSocketUtils.safeClose(ws, 'media stream', 1001, 'Server shutting down');
        })
    )
  );

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), websocketShutdownConfig.shutdownTimeout);
  });

  const outcome = await Promise.race([closeAll.then(() => 'closed' as const), timeout]);
  clearTimeout(timer);

  if (outcome === 'timeout') {
    logger.warn('WebSocket clients force closed after timeout');
    wss.clients.forEach((ws) => ws.terminate());
  }

  await new Promise<void>((resolve) => {
    wss.close(() => {
      logger.info('WebSocket server closed');
      resolve();
    });
  });
}
