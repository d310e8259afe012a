/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as accessLogger } from 'hono/logger';
import type pino from 'pino';

import type { StorageService } from '../services/storage.service.js';

import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import { createFileRoutes } from './routes/files.js';
import { createHealthRoutes } from './routes/health.js';
import { createStorageRoutes } from './routes/storage.js';

/**
 * App configuration
 */
export interface AppOptions {
  storageService: StorageService;
  logger: pino.Logger;
  apiToken: string;
  tempDir: string;
  maxFileSize: number;
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(options: AppOptions): Hono {
  const { storageService, logger, apiToken, allowedOrigins } = options;
  const app = new Hono();

  // Global middleware
  app.use(
    '*',
    accessLogger((message: string) => logger.info(message))
  );
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      allowHeaders: ['Authorization', 'Content-Type', 'X-Owner-Id'],
    })
  );

  // Public routes (no auth)
  app.use('/api/v1/health', createPublicMiddleware());
  app.route(
    '/api/v1',
    createHealthRoutes({
      describeBackends: () => storageService.describeBackends(),
    })
  );

  // Protected routes
  const authMiddleware = createAuthMiddleware({ apiToken });

  app.use('/api/v1/files/*', authMiddleware);
  app.use('/api/v1/files', authMiddleware);
  app.route(
    '/api/v1',
    createFileRoutes({
      storageService,
      logger,
      tempDir: options.tempDir,
      maxFileSize: options.maxFileSize,
    })
  );

  app.use('/api/v1/storage', authMiddleware);
  app.route('/api/v1', createStorageRoutes({ storageService }));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId') ?? 'unknown';
    logger.error({ err, requestId }, 'Unhandled error');

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
