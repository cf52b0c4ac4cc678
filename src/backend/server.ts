/**
 * Express server setup - main entry point for the backend API server.
 * Configures Express middleware, mounts routes, and starts the HTTP server.
 */

// Load and validate environment configuration (fails fast on invalid values)
import { config } from './config';

import express, { Application } from 'express';
import cors from 'cors';
import { logger, logFatal } from './logger';
import { authenticateRequest } from './middleware/auth';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createApiRouter } from './routes';
import { adapterManager, FilesystemAdapterManager } from './services';

/**
 * Base64 uploads travel inside JSON bodies
 */
const JSON_BODY_LIMIT = '25mb';

export function createApp(manager: FilesystemAdapterManager = adapterManager): Application {
  const app = express();

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Allow requests with no origin (like mobile apps or curl)
      if (!origin || config.cors.origins.includes(origin)) {
        callback(null, true);
        return;
      }
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true,
    exposedHeaders: ['Last-Modified'],
  };

  app.use(requestLogger);
  app.use(cors(corsOptions));
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  // Health check endpoint (unauthenticated - for load balancers/monitoring)
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Apply authentication to all /api routes below this point
  app.use('/api', authenticateRequest);

  app.get('/api/me', (req, res) => {
    res.json(req.user);
  });

  app.use('/api', createApiRouter(manager));

  app.use(errorHandler);

  return app;
}

export const start = (): void => {
  const app = createApp();
  const server = app.listen(config.server.port, () => {
    logger.info({ port: config.server.port, storage: config.storage.defaultProvider }, 'Server listening');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      adapterManager.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

// Start server when run directly
if (require.main === module) {
  try {
    start();
  } catch (error) {
    logFatal(error, 'Server failed to start');
  }
}

export default createApp;
