import express from 'express';
import cors from 'cors';
import logger from './utils/logger';
import { CallbackRouterOptions, createCallbackRouter } from './routes/callbacks';

export interface AppOptions extends CallbackRouterOptions {
  nodeEnv?: string;
}

export function createApp(options: AppOptions = {}): express.Express {
  const { nodeEnv = 'development', ...callbackOptions } = options;
  const app = express();

  // Middleware
  app.use(cors());

  // Callback routes
  app.use('/callbacks', createCallbackRouter(callbackOptions));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      environment: nodeEnv
    });
  });

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ error: 'Route not found' });
  });

  // Error handler
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const message = err instanceof Error ? err.message : String(err);
    logger.error('Unhandled error', { error: message });
    res.status(500).json({
      status: 'error',
      error: 'internal_server_error',
      message: nodeEnv === 'development' ? message : 'Something went wrong'
    });
  });

  return app;
}
