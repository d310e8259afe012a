/**
 * Storage Route
 * Backend and disk usage overview
 */

import { Hono } from 'hono';

import { formatFileSize } from '../../lib/format.js';
import type { StorageService } from '../../services/storage.service.js';
import { errorResponse, successResponse } from '../utils/response.js';

/**
 * Create storage info routes
 */
export function createStorageRoutes(deps: {
  storageService: StorageService;
}): Hono {
  const { storageService } = deps;
  const app = new Hono();

  /**
   * GET /storage
   */
  app.get('/storage', async (c) => {
    const requestId = c.get('requestId');
    const result = await storageService.getStorageInfo();

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      { ...result.data, totalSize: formatFileSize(result.data.totalBytes) },
      requestId
    );
  });

  return app;
}
