/**
 * Structured logger shared by every service
 */

import pino from 'pino';

import type { LogLevel } from './config.js';

export function createLogger(level: LogLevel): pino.Logger {
  return pino({
    name: 'file-relay',
    level,
    redact: {
      paths: [
        'apiToken',
        'botToken',
        'serviceKey',
        'req.headers.authorization',
      ],
      censor: '[Redacted]',
    },
  });
}
