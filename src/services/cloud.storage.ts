/**
 * Supabase Storage Adapter
 * Implementation of StorageServiceCloud for a public Supabase bucket
 *
 * The bucket holds redundant copies only; nothing reads them back.
 */

import { readFile } from 'node:fs/promises';

import type { SupabaseClient } from '@supabase/supabase-js';

import { BackendError } from '../types/index.js';

import type { StorageServiceCloud } from './storage.service.js';

/**
 * Create Supabase Storage adapter
 */
export function createSupabaseCloudAdapter(
  supabase: SupabaseClient,
  bucket: string
): StorageServiceCloud {
  return {
    /**
     * Upload a file and return its public URL
     */
    async upload(filePath: string, objectPath: string): Promise<string | null> {
      const body = await readFile(filePath);

      const { data, error } = await supabase.storage
        .from(bucket)
        .upload(objectPath, body, {
          contentType: 'application/octet-stream',
          upsert: false,
        });

      if (error) {
        throw new BackendError(
          'cloud',
          `Failed to upload to bucket: ${error.message}`
        );
      }

      if (data === null) {
        return null;
      }

      const {
        data: { publicUrl },
      } = supabase.storage.from(bucket).getPublicUrl(data.path);

      return publicUrl;
    },

    /**
     * Delete an object from the bucket
     */
    async delete(objectPath: string): Promise<void> {
      const { error } = await supabase.storage
        .from(bucket)
        .remove([objectPath]);

      if (error) {
        throw new BackendError(
          'cloud',
          `Failed to delete from bucket: ${error.message}`
        );
      }
    },
  };
}
