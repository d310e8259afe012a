/**
 * Auth Middleware Unit Tests
 * Tests for ActorContext construction from the service token
 */

import { Hono } from 'hono';
import { beforeEach, describe, it, expect } from 'vitest';

import {
  createAuthMiddleware,
  createPublicMiddleware,
} from '@/api/middleware/auth.js';

describe('Auth Middleware', () => {
  let app: Hono;

  beforeEach(() => {
    app = new Hono();
    app.use('*', createAuthMiddleware({ apiToken: 'test-secret' }));
    app.get('/test', (c) => {
      const actor = c.get('actor');
      return c.json({
        type: actor.type,
        ownerId: actor.ownerId ?? null,
        sameRequestId: actor.requestId === c.get('requestId'),
      });
    });
  });

  describe('Token Extraction', () => {
    it('should return 401 when Authorization header is missing', async () => {
      const res = await app.request('/test');

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid authorization header',
        },
      });
    });

    it('should return 401 when Authorization header is not Bearer', async () => {
      const res = await app.request('/test', {
        headers: { Authorization: 'Basic test-secret' },
      });

      expect(res.status).toBe(401);
    });

    it('should return 401 when the token does not match', async () => {
      const res = await app.request('/test', {
        headers: { Authorization: 'Bearer wrong-secret' },
      });

      expect(res.status).toBe(401);
    });

    it('should return 401 when Bearer token is empty', async () => {
      const res = await app.request('/test', {
        headers: { Authorization: 'Bearer   ' },
      });

      expect(res.status).toBe(401);
    });
  });

  describe('ActorContext', () => {
    it('should build a service actor for the named owner', async () => {
      const res = await app.request('/test', {
        headers: {
          Authorization: 'Bearer test-secret',
          'X-Owner-Id': ' 12345 ',
        },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        type: 'service',
        ownerId: '12345',
        sameRequestId: true,
      });
    });

    it('should leave the owner unset without the header', async () => {
      const res = await app.request('/test', {
        headers: { Authorization: 'Bearer test-secret' },
      });

      expect(await res.json()).toEqual({
        type: 'service',
        ownerId: null,
        sameRequestId: true,
      });
    });

    it('should reject overlong owner ids', async () => {
      const res = await app.request('/test', {
        headers: {
          Authorization: 'Bearer test-secret',
          'X-Owner-Id': 'x'.repeat(129),
        },
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR' },
      });
    });
  });
});

describe('Public Middleware', () => {
  it('should attach an anonymous actor', async () => {
    const app = new Hono();
    app.use('*', createPublicMiddleware());
    app.get('/test', (c) =>
      c.json({ type: c.get('actor').type, userAgent: c.get('actor').userAgent })
    );

    const res = await app.request('/test', {
      headers: { 'User-Agent': 'relay-test' },
    });

    expect(await res.json()).toEqual({
      type: 'anonymous',
      userAgent: 'relay-test',
    });
  });
});
