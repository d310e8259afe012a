/**
 * File Relay Application Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { mkdir } from 'node:fs/promises';

import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { ConfigError, describeConfig, loadConfig } from './lib/config.js';
import type { AppConfig } from './lib/config.js';
import { createLogger } from './lib/logger.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import {
  createCompressionService,
  createLocalStore,
  createStorageService,
  createSupabaseCloudAdapter,
  createTelegramChannelAdapter,
  loadMetadataIndex,
} from './services/index.js';

// Validate environment
let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(error.message);
    process.exit(1);
  }
  throw error;
}

const logger = createLogger(config.logLevel);
logger.info({ config: describeConfig(config) }, 'Configuration loaded');

await mkdir(config.storageDir, { recursive: true });
await mkdir(config.tempDir, { recursive: true });

// Wire backends
const index = await loadMetadataIndex({
  filePath: config.metadataFile,
  logger: logger.child({ component: 'metadata-index' }),
});

const channel =
  config.channel === null
    ? null
    : createTelegramChannelAdapter(config.channel);

const cloud =
  config.cloud === null
    ? null
    : createSupabaseCloudAdapter(
        createSupabaseAdmin(config.cloud),
        config.cloud.bucket
      );

// Wire services
const storageService = createStorageService({
  index,
  codec: createCompressionService({
    logger: logger.child({ component: 'compression' }),
  }),
  local: createLocalStore({ rootDir: config.storageDir }),
  channel,
  cloud,
  logger: logger.child({ service: 'storage' }),
  settings: {
    tempDir: config.tempDir,
    backendTimeoutMs: config.backendTimeoutMs,
    defaultAlgorithm: config.compression.algorithm,
    defaultLevel: config.compression.level,
  },
});

logger.info(
  { backends: storageService.describeBackends() },
  'Storage backends ready'
);

// Create the API application
const app = createApp({
  storageService,
  logger: logger.child({ component: 'http' }),
  apiToken: config.apiToken,
  tempDir: config.tempDir,
  maxFileSize: config.maxFileSize,
  allowedOrigins: config.allowedOrigins,
});

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info({ port: config.port }, 'Server started');

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'Shutting down');
  server.close((error) => {
    if (error) {
      logger.error({ err: error }, 'Server close failed');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.once('SIGTERM', shutdown);
process.once('SIGINT', shutdown);

export { app };
