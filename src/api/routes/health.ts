/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import type { StorageKind } from '../../types/index.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: {
  describeBackends: () => StorageKind[];
}): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Health check - no authentication required
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: 'v1',
      backends: deps.describeBackends(),
    });
  });

  return app;
}
