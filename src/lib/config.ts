/**
 * Application Configuration
 * Environment variables validated once at startup
 */

import path from 'node:path';

import { z } from 'zod';

import type { CompressionAlgorithm } from '../types/index.js';

const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Treat empty and whitespace-only variables as unset
 */
function blankAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) =>
      typeof value === 'string' && value.trim() === '' ? undefined : value,
    schema
  );
}

const envSchema = z.object({
  PORT: blankAsUnset(z.coerce.number().int().positive().default(3000)),
  API_TOKEN: blankAsUnset(
    z.string({ required_error: 'API_TOKEN is required' }).min(1)
  ),
  ALLOWED_ORIGINS: blankAsUnset(z.string().default('http://localhost:3000')),
  DATA_DIR: blankAsUnset(z.string().default('./data')),
  MAX_FILE_SIZE: blankAsUnset(
    z.coerce
      .number()
      .int()
      .positive()
      .default(4 * 1024 * 1024 * 1024)
  ),
  DEFAULT_COMPRESSION: blankAsUnset(
    z.enum(['gzip', 'deflate', 'brotli']).default('gzip')
  ),
  COMPRESSION_LEVEL: blankAsUnset(
    z.coerce.number().int().min(1).max(9).default(6)
  ),
  BACKEND_TIMEOUT_MS: blankAsUnset(
    z.coerce.number().int().positive().default(120_000)
  ),
  TELEGRAM_BOT_TOKEN: blankAsUnset(z.string().optional()),
  STORAGE_CHANNEL_ID: blankAsUnset(
    z
      .string()
      .regex(/^-?\d+$/, 'STORAGE_CHANNEL_ID must be a numeric chat id')
      .optional()
  ),
  TELEGRAM_API_URL: blankAsUnset(
    z.string().url().default('https://api.telegram.org')
  ),
  SUPABASE_URL: blankAsUnset(z.string().url().optional()),
  SUPABASE_SERVICE_KEY: blankAsUnset(z.string().optional()),
  SUPABASE_BUCKET: blankAsUnset(z.string().default('file-backups')),
  LOG_LEVEL: blankAsUnset(z.enum(LOG_LEVELS).default('info')),
});

export interface ChannelConfig {
  botToken: string;
  channelId: string;
  apiUrl: string;
}

export interface CloudConfig {
  url: string;
  serviceKey: string;
  bucket: string;
}

export interface AppConfig {
  port: number;
  apiToken: string;
  allowedOrigins: string[];
  dataDir: string;
  metadataFile: string;
  storageDir: string;
  tempDir: string;
  maxFileSize: number;
  compression: {
    algorithm: CompressionAlgorithm;
    level: number;
  };
  backendTimeoutMs: number;
  logLevel: LogLevel;
  /** null when the storage channel is not configured */
  channel: ChannelConfig | null;
  /** null when the cloud bucket is not configured */
  cloud: CloudConfig | null;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }

  const vars = parsed.data;
  const dataDir = path.resolve(vars.DATA_DIR);

  const channel =
    vars.TELEGRAM_BOT_TOKEN !== undefined &&
    vars.STORAGE_CHANNEL_ID !== undefined
      ? {
          botToken: vars.TELEGRAM_BOT_TOKEN,
          channelId: vars.STORAGE_CHANNEL_ID,
          apiUrl: vars.TELEGRAM_API_URL.replace(/\/+$/, ''),
        }
      : null;

  const cloud =
    vars.SUPABASE_URL !== undefined && vars.SUPABASE_SERVICE_KEY !== undefined
      ? {
          url: vars.SUPABASE_URL,
          serviceKey: vars.SUPABASE_SERVICE_KEY,
          bucket: vars.SUPABASE_BUCKET,
        }
      : null;

  return {
    port: vars.PORT,
    apiToken: vars.API_TOKEN,
    allowedOrigins: vars.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    dataDir,
    metadataFile: path.join(dataDir, 'file_metadata.json'),
    storageDir: path.join(dataDir, 'file_storage'),
    tempDir: path.join(dataDir, 'tmp'),
    maxFileSize: vars.MAX_FILE_SIZE,
    compression: {
      algorithm: vars.DEFAULT_COMPRESSION,
      level: vars.COMPRESSION_LEVEL,
    },
    backendTimeoutMs: vars.BACKEND_TIMEOUT_MS,
    logLevel: vars.LOG_LEVEL,
    channel,
    cloud,
  };
}

/**
 * Summary safe to log: secrets are masked
 */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    port: config.port,
    apiToken: '***',
    dataDir: config.dataDir,
    maxFileSize: config.maxFileSize,
    compression: `${config.compression.algorithm}@${config.compression.level}`,
    backendTimeoutMs: config.backendTimeoutMs,
    channel:
      config.channel === null
        ? 'not configured'
        : { channelId: config.channel.channelId, botToken: '***' },
    cloud:
      config.cloud === null
        ? 'not configured'
        : { url: config.cloud.url, bucket: config.cloud.bucket },
  };
}
