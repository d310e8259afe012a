/**
 * CompressionService
 *
 * Codec adapter over Node's zlib streams. Work runs on the libuv thread
 * pool, so compressing a large file never blocks the event loop.
 *
 * Contract:
 * - compress() writes <input><suffix> beside the input and removes any
 *   partial output when it fails
 * - decompress() picks the codec from the file suffix; an unknown suffix
 *   is a hard error
 */

import {
  constants as fsConstants,
  createReadStream,
  createWriteStream,
} from 'node:fs';
import { access, rm } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { Transform } from 'node:stream';
import zlib from 'node:zlib';

import type pino from 'pino';

import type { CompressionAlgorithm, CompressionInfo } from '../types/index.js';
import { COMPRESSION_ALGORITHMS, StorageError } from '../types/index.js';

/**
 * File suffix per codec
 */
export const ALGORITHM_SUFFIX: Record<CompressionAlgorithm, string> = {
  gzip: '.gz',
  deflate: '.zz',
  brotli: '.br',
};

export const MIN_COMPRESSION_LEVEL = 1;
export const MAX_COMPRESSION_LEVEL = 9;

const TEXT_EXTENSIONS = new Set([
  '.txt',
  '.log',
  '.csv',
  '.json',
  '.xml',
  '.html',
  '.css',
  '.js',
  '.md',
]);

const PRECOMPRESSED_EXTENSIONS = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.mp3',
  '.mp4',
  '.zip',
  '.rar',
  '.7z',
]);

const LARGE_FILE_BYTES = 100 * 1024 * 1024;

/**
 * CompressionService interface
 */
export interface CompressionService {
  compress(
    inputPath: string,
    algorithm: CompressionAlgorithm,
    level: number
  ): Promise<string>;
  decompress(inputPath: string, outputPath?: string): Promise<string>;
  getCompressionInfo(
    originalSize: number,
    compressedSize: number
  ): CompressionInfo;
  recommendAlgorithm(
    fileName: string,
    sizeBytes: number,
    fallback: CompressionAlgorithm
  ): CompressionAlgorithm;
}

export function isCompressionAlgorithm(
  value: string
): value is CompressionAlgorithm {
  return COMPRESSION_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Resolve the codec from a compressed file's suffix
 */
export function algorithmFromPath(filePath: string): CompressionAlgorithm {
  const match = COMPRESSION_ALGORITHMS.find((algorithm) =>
    filePath.endsWith(ALGORITHM_SUFFIX[algorithm])
  );
  if (match === undefined) {
    throw new StorageError(
      'UNSUPPORTED_OPERATION',
      `Unable to determine compression type from filename: ${path.basename(filePath)}`
    );
  }
  return match;
}

function createCompressor(
  algorithm: CompressionAlgorithm,
  level: number
): Transform {
  switch (algorithm) {
    case 'gzip':
      return zlib.createGzip({ level });
    case 'deflate':
      return zlib.createDeflate({ level });
    case 'brotli':
      return zlib.createBrotliCompress({
        params: { [zlib.constants.BROTLI_PARAM_QUALITY]: level },
      });
  }
}

function createDecompressor(algorithm: CompressionAlgorithm): Transform {
  switch (algorithm) {
    case 'gzip':
      return zlib.createGunzip();
    case 'deflate':
      return zlib.createInflate();
    case 'brotli':
      return zlib.createBrotliDecompress();
  }
}

async function ensureReadable(filePath: string): Promise<void> {
  try {
    await access(filePath, fsConstants.R_OK);
  } catch (error) {
    throw new StorageError(
      'INPUT_NOT_FOUND',
      `Input file not found: ${filePath}`,
      { cause: error }
    );
  }
}

/**
 * Create CompressionService instance
 */
export function createCompressionService(deps: {
  logger: pino.Logger;
}): CompressionService {
  const { logger } = deps;

  return {
    async compress(
      inputPath: string,
      algorithm: CompressionAlgorithm,
      level: number
    ): Promise<string> {
      if (!isCompressionAlgorithm(algorithm)) {
        throw new StorageError(
          'UNSUPPORTED_OPERATION',
          `Unsupported compression algorithm: ${String(algorithm)}`
        );
      }
      if (
        !Number.isInteger(level) ||
        level < MIN_COMPRESSION_LEVEL ||
        level > MAX_COMPRESSION_LEVEL
      ) {
        throw new StorageError(
          'UNSUPPORTED_OPERATION',
          `Compression level must be between ${MIN_COMPRESSION_LEVEL} and ${MAX_COMPRESSION_LEVEL}`
        );
      }
      await ensureReadable(inputPath);

      const outputPath = `${inputPath}${ALGORITHM_SUFFIX[algorithm]}`;
      logger.debug({ inputPath, algorithm, level }, 'Compressing file');

      try {
        await pipeline(
          createReadStream(inputPath),
          createCompressor(algorithm, level),
          createWriteStream(outputPath)
        );
      } catch (error) {
        await rm(outputPath, { force: true });
        throw error;
      }

      return outputPath;
    },

    async decompress(inputPath: string, outputPath?: string): Promise<string> {
      const algorithm = algorithmFromPath(inputPath);
      await ensureReadable(inputPath);

      const target =
        outputPath ??
        inputPath.slice(0, -ALGORITHM_SUFFIX[algorithm].length);
      logger.debug({ inputPath, target, algorithm }, 'Decompressing file');

      try {
        await pipeline(
          createReadStream(inputPath),
          createDecompressor(algorithm),
          createWriteStream(target)
        );
      } catch (error) {
        await rm(target, { force: true });
        throw error;
      }

      return target;
    },

    getCompressionInfo(
      originalSize: number,
      compressedSize: number
    ): CompressionInfo {
      const compressionRatio =
        originalSize === 0 ? 0 : (1 - compressedSize / originalSize) * 100;

      return {
        originalSize,
        compressedSize,
        compressionRatio,
        spaceSaved: originalSize - compressedSize,
      };
    },

    recommendAlgorithm(
      fileName: string,
      sizeBytes: number,
      fallback: CompressionAlgorithm
    ): CompressionAlgorithm {
      const extension = path.extname(fileName).toLowerCase();

      if (TEXT_EXTENSIONS.has(extension)) {
        return 'gzip';
      }
      // Already compressed: the cheapest codec is enough
      if (PRECOMPRESSED_EXTENSIONS.has(extension)) {
        return 'deflate';
      }
      if (sizeBytes > LARGE_FILE_BYTES) {
        return 'brotli';
      }
      return fallback;
    },
  };
}
