import { env, validateEnv, websocketConfig } from '@/shared/config';
import express from 'express';
import { createServer } from 'http';
import cors from 'cors';
import { logger } from '@/shared/utils';
import { callController } from '@/modules/call';
import {
  createTwilioRouter,
  initializeSocketServer,
  shutdownSocketServer,
  getSocketStats,
} from '@/modules/socket';

// Validate environment variables
try {
  validateEnv();
} catch (error) {
  logger.error('Environment validation failed', { error });
  process.exit(1);
}

// Create Express app
const app = express();

// Middleware (Twilio posts webhooks form-encoded)
app.use(cors());
app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use(createTwilioRouter({ publicHost: env.PUBLIC_HOST, greeting: env.CALL_GREETING }));

// Health check endpoint
app.get('/health', (_req, res) => {
  const socketStats = getSocketStats(wss);

  res.json({
    status: 'ok',
    uptime: process.uptime(),
    websocketServer: socketStats,
    calls: callController.getStats(),
  });
});

// Create HTTP server
const httpServer = createServer(app);

// Initialize media stream server
const wss = initializeSocketServer(httpServer);

let shuttingDown = false;

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    // Step 1: Stop accepting new connections
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        logger.warn('HTTP server force closed after timeout');
        resolve();
      }, 5000);

      httpServer.close(() => {
        clearTimeout(timer);
        logger.info('HTTP server closed');
        resolve();
      });
    });

    // Step 2: End every live call, then close the media streams
    const ended = callController.shutdown();
    logger.info('Call sessions ended', { count: ended });

    await shutdownSocketServer(wss);

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', { error });
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
httpServer.listen(env.PORT, () => {
  logger.info('Call pipeline server started', {
    port: env.PORT,
    environment: env.NODE_ENV,
    mediaStreamPath: websocketConfig.path,
  });
});
