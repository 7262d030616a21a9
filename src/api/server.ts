/**
 * Attribution API Server
 * Express server with middleware configuration
 */

import type { Server } from 'http';
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { AttributionEngine } from '../services/attribution-engine.js';
import { AttributionError, InvalidInputError } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { createRoutes } from './routes.js';

export interface AppOptions {
  logger?: Logger;
  corsOrigin?: string;
}

/**
 * Client errors raised by middleware (malformed JSON, oversized body)
 */
function clientErrorStatus(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

// Create Express app
export function createApp(engine: AttributionEngine, options: AppOptions = {}) {
  const logger = (options.logger ?? rootLogger).child({ component: 'http' });
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS configuration
  app.use(cors({
    origin: options.corsOrigin ?? process.env.CORS_ORIGIN ?? '*',
    methods: ['GET', 'POST', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  // JSON parsing
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info({
        method: req.method,
        url: req.url,
        status: res.statusCode,
        duration: `${duration}ms`,
      });
    });

    next();
  });

  // API routes
  app.use('/api/v1', createRoutes(engine));

  app.get('/', (_req, res) => {
    res.json({
      name: 'Address Attribution Ledger API',
      version: '0.1.0',
      description: 'Cross-source consolidation of blockchain address attribution',
      health: '/api/v1/health',
      statistics: '/api/v1/statistics',
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path,
    });
  });

  // Error handler
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof InvalidInputError) {
      res.status(400).json({
        error: 'Invalid input',
        message: err.message,
        issues: err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      });
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      res.status(clientStatus).json({ error: 'Bad request', message: err.message });
      return;
    }

    logger.error({
      error: err.message,
      code: err instanceof AttributionError ? err.code : undefined,
      stack: err.stack,
      method: req.method,
      url: req.url,
    });

    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : 'An error occurred',
    });
  });

  return app;
}

// Start server
export async function startServer(
  engine: AttributionEngine,
  port: number = 3000,
  options: AppOptions = {}
): Promise<Server> {
  const logger = options.logger ?? rootLogger;
  const app = createApp(engine, options);

  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Attribution API server running on port ${port}`);
      logger.info(`Health check: http://localhost:${port}/api/v1/health`);
      resolve(server);
    });

    server.on('error', reject);
  });
}
