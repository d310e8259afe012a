/**
 * Auth Middleware
 * Constructs ActorContext from the service bearer token
 *
 * The bot front end is the only client. It presents API_TOKEN and names
 * the chat user it acts for in the X-Owner-Id header.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { ActorContext } from '../../types/index.js';

export const OWNER_HEADER = 'X-Owner-Id';

const MAX_OWNER_ID_LENGTH = 128;

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  apiToken: string;
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Constant-time token comparison; hashing first evens out lengths
 */
function tokensMatch(presented: string, expected: string): boolean {
  return timingSafeEqual(digest(presented), digest(expected));
}

function requestMeta(c: Context): Pick<ActorContext, 'ip' | 'userAgent'> {
  const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
  const userAgent = c.req.header('user-agent');

  return {
    ...(ip !== undefined && { ip }),
    ...(userAgent !== undefined && { userAgent }),
  };
}

/**
 * Create auth middleware for protected routes
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { apiToken } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    const token = authHeader?.startsWith('Bearer ')
      ? authHeader.slice(7).trim()
      : '';

    if (!token || !tokensMatch(token, apiToken)) {
      return c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message: 'Missing or invalid authorization header',
            requestId,
          },
        },
        401
      );
    }

    // 2. Owner the call acts for
    const ownerId = c.req.header(OWNER_HEADER)?.trim();

    if (ownerId !== undefined && ownerId.length > MAX_OWNER_ID_LENGTH) {
      return c.json(
        {
          error: {
            code: 'VALIDATION_ERROR',
            message: `${OWNER_HEADER} must be at most ${MAX_OWNER_ID_LENGTH} characters`,
            requestId,
          },
        },
        400
      );
    }

    // 3. Construct ActorContext
    const actor: ActorContext = {
      type: 'service',
      requestId,
      ...(ownerId !== undefined && ownerId !== '' && { ownerId }),
      ...requestMeta(c),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    await next();
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware() {
  return async function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      ...requestMeta(c),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    await next();
  };
}
