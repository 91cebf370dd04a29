import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import type { ServerContainer } from './infrastructure/di/setupContainer.js';
import { createVerificationRouter } from './presentation/routes/verification.js';
import { errorHandler } from './presentation/middleware/errorHandler.js';

export interface AppOptions {
  corsOrigin?: string;
  logLevel?: string;
}

/**
 * Express アプリを組み立てる（listen は呼び出し側）
 */
export function createApp(container: ServerContainer, options: AppOptions = {}): express.Express {
  const app = express();
  const logLevel = options.logLevel ?? 'info';

  // Middleware
  app.use(cors({
    origin: options.corsOrigin ?? '*',
  }));
  if (logLevel !== 'silent') {
    app.use(morgan(logLevel === 'debug' ? 'dev' : 'combined'));
  }

  // API routes
  app.use('/api', createVerificationRouter(container.resolve('VerificationController')));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
