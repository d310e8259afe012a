/**
 * File Routes
 * Upload, list, describe, download and delete stored files
 */

import { createReadStream } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';

import { Hono } from 'hono';
import type { Context } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import type { BodyData } from 'hono/utils/body';
import type pino from 'pino';
import { z } from 'zod';

import type { StorageService } from '../../services/storage.service.js';
import type { ActorContext, FileSummary } from '../../types/index.js';
import { OWNER_HEADER } from '../middleware/auth.js';
import { resolveIncomingMedia } from '../utils/media.js';
import { errorResponse, successResponse } from '../utils/response.js';

/** Room for multipart framing on top of the file itself */
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

const uploadFieldsSchema = z.object({
  algorithm: z.enum(['gzip', 'deflate', 'brotli', 'auto']).optional(),
  level: z.coerce.number().int().optional(),
  kind: z.enum(['document', 'image', 'video', 'audio']).optional(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

/**
 * Helper to get actor from context
 */
function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

function serializeSummary(summary: FileSummary) {
  return { ...summary, createdAt: summary.createdAt.toISOString() };
}

/**
 * Attachment header that survives non-ASCII names
 */
export function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

/**
 * Create file routes
 */
export function createFileRoutes(deps: {
  storageService: StorageService;
  logger: pino.Logger;
  tempDir: string;
  maxFileSize: number;
}): Hono {
  const { storageService, logger, tempDir, maxFileSize } = deps;
  const app = new Hono();

  /**
   * Owner from the actor, or a 400 response when the header is missing
   */
  function requireOwner(c: Context): string | Response {
    const ownerId = getActor(c).ownerId;
    if (ownerId === undefined) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: `${OWNER_HEADER} header is required`,
        },
        getRequestId(c)
      );
    }
    return ownerId;
  }

  async function discard(target: string): Promise<void> {
    try {
      await rm(target, { recursive: true, force: true });
    } catch (error) {
      logger.warn({ target, err: error }, 'Failed to remove staging path');
    }
  }

  // ─────────────────────────────────────────────────────────────
  // UPLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /files
   * Multipart upload: file, optional algorithm, level and kind
   */
  app.post(
    '/files',
    bodyLimit({
      maxSize: maxFileSize + MULTIPART_OVERHEAD_BYTES,
      onError: (c) =>
        errorResponse(
          c,
          {
            code: 'FILE_TOO_LARGE',
            message: `File exceeds the ${maxFileSize} byte limit`,
          },
          getRequestId(c)
        ),
    }),
    async (c) => {
      const requestId = getRequestId(c);
      const ownerId = requireOwner(c);
      if (typeof ownerId !== 'string') {
        return ownerId;
      }

      const body = await c.req.parseBody<BodyData>().catch(() => null);
      if (body === null) {
        return errorResponse(
          c,
          { code: 'VALIDATION_ERROR', message: 'Expected a multipart body' },
          requestId
        );
      }

      const file = body['file'];
      if (
        file === undefined ||
        typeof file === 'string' ||
        Array.isArray(file)
      ) {
        return errorResponse(
          c,
          { code: 'VALIDATION_ERROR', message: 'file is required' },
          requestId
        );
      }

      const fields: Record<string, string> = {};
      for (const [key, value] of Object.entries(body)) {
        if (typeof value === 'string') {
          fields[key] = value;
        }
      }
      const parsed = uploadFieldsSchema.safeParse(fields);
      if (!parsed.success) {
        return errorResponse(
          c,
          {
            code: 'VALIDATION_ERROR',
            message: 'Invalid upload fields',
            details: parsed.error.issues.map((issue) => ({
              field: issue.path.join('.'),
              message: issue.message,
            })),
          },
          requestId
        );
      }

      if (file.size > maxFileSize) {
        return errorResponse(
          c,
          {
            code: 'FILE_TOO_LARGE',
            message: `File exceeds the ${maxFileSize} byte limit`,
          },
          requestId
        );
      }

      const media = resolveIncomingMedia({
        ...(parsed.data.kind !== undefined && { kind: parsed.data.kind }),
        fileName: file.name,
        size: file.size,
        mimeType: file.type,
      });

      await mkdir(tempDir, { recursive: true });
      const stagingDir = await mkdtemp(path.join(tempDir, 'upload-'));

      try {
        const sourcePath = path.join(stagingDir, media.suggestedName);
        await writeFile(sourcePath, Buffer.from(await file.arrayBuffer()));

        const result = await storageService.ingest({
          sourcePath,
          ownerId,
          media,
          ...(parsed.data.algorithm !== undefined && {
            algorithm: parsed.data.algorithm,
          }),
          ...(parsed.data.level !== undefined && { level: parsed.data.level }),
        });

        if (!result.success) {
          return errorResponse(c, result.error, requestId);
        }

        return successResponse(c, result.data, requestId, 201);
      } finally {
        await discard(stagingDir);
      }
    }
  );

  // ─────────────────────────────────────────────────────────────
  // LIST
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /files
   * Owner's files, newest first
   */
  app.get('/files', async (c) => {
    const requestId = getRequestId(c);
    const ownerId = requireOwner(c);
    if (typeof ownerId !== 'string') {
      return ownerId;
    }

    const query = listQuerySchema.safeParse({ limit: c.req.query('limit') });
    if (!query.success) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'limit must be a positive integer' },
        requestId
      );
    }

    const result = await storageService.list(ownerId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const files =
      query.data.limit === undefined
        ? result.data
        : result.data.slice(0, query.data.limit);

    return successResponse(c, files.map(serializeSummary), requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // DESCRIBE
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /files/:id
   */
  app.get('/files/:id', async (c) => {
    const requestId = getRequestId(c);
    const ownerId = requireOwner(c);
    if (typeof ownerId !== 'string') {
      return ownerId;
    }

    const result = await storageService.getFile(c.req.param('id'), ownerId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeSummary(result.data), requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // DOWNLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /files/:id/content
   * Streams the decompressed file; the restored copy is removed afterwards
   */
  app.get('/files/:id/content', async (c) => {
    const requestId = getRequestId(c);
    const ownerId = requireOwner(c);
    if (typeof ownerId !== 'string') {
      return ownerId;
    }

    const fileId = c.req.param('id');
    const result = await storageService.download(fileId, ownerId, (progress) =>
      logger.debug({ fileId, requestId, ...progress }, 'Download progress')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const restored = result.data;
    const stream = createReadStream(restored.path);
    stream.once('close', () => {
      void discard(restored.path);
    });

    return new Response(Readable.toWeb(stream), {
      status: 200,
      headers: {
        'Content-Type': 'application/octet-stream',
        'Content-Disposition': contentDisposition(restored.originalName),
        'X-Request-Id': requestId,
        'X-Storage-Source': restored.source,
      },
    });
  });

  // ─────────────────────────────────────────────────────────────
  // DELETE
  // ─────────────────────────────────────────────────────────────

  /**
   * DELETE /files/:id
   */
  app.delete('/files/:id', async (c) => {
    const requestId = getRequestId(c);
    const ownerId = requireOwner(c);
    if (typeof ownerId !== 'string') {
      return ownerId;
    }

    const result = await storageService.delete(c.req.param('id'), ownerId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    if (!result.data) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'File not found' },
        requestId
      );
    }

    return successResponse(c, { deleted: true }, requestId);
  });

  return app;
}
