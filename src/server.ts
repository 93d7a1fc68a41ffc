import { Server } from 'http';
import { createApp } from './app';
import { CallbackHandler } from './routes/callbacks';
import { loadServerConfig } from './utils/config';
import logger from './utils/logger';

/**
 * Starts the callback receiver. The default handler only logs; embed
 * `createApp` to process callbacks.
 */
export function startServer(handler?: CallbackHandler): Promise<Server> {
  const config = loadServerConfig();
  const app = createApp({
    nodeEnv: config.nodeEnv,
    secret: config.callbackSecret,
    handler
  });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, () => {
      logger.info(`Callback server running on port ${config.port}`);
      logger.info(`Environment: ${config.nodeEnv}`);
      logger.info(`Signature verification: ${config.callbackSecret ? 'enabled' : 'disabled'}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}

if (require.main === module) {
  // Handle graceful shutdown
  process.on('SIGINT', () => {
    logger.info('Received SIGINT, shutting down gracefully...');
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    logger.info('Received SIGTERM, shutting down gracefully...');
    process.exit(0);
  });

  startServer((snapshot) => {
    logger.info('Task update received', { taskId: snapshot.taskId, status: snapshot.status });
  }).catch((error: unknown) => {
    logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
