/**
 * Health Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';

import { createHealthRoutes } from '@/api/routes/health.js';

function createTestApp(): Hono {
  const app = new Hono();
  app.route(
    '/api/v1',
    createHealthRoutes({ describeBackends: () => ['channel', 'local'] })
  );
  return app;
}

describe('Health Route', () => {
  describe('GET /health', () => {
    it('should return 200 with status, version and backends', async () => {
      const res = await createTestApp().request('/api/v1/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'ok',
        version: 'v1',
        backends: ['channel', 'local'],
      });
    });

    it('should include an ISO timestamp', async () => {
      const res = await createTestApp().request('/api/v1/health');

      const body: unknown = await res.json();
      expect(body).toMatchObject({ timestamp: expect.any(String) });
      if (
        typeof body === 'object' &&
        body !== null &&
        'timestamp' in body &&
        typeof body.timestamp === 'string'
      ) {
        expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
      }
    });
  });
});
