/**
 * Supabase Storage Adapter Unit Tests
 * A real Supabase client talks to a mocked fetch
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';

import { createSupabaseAdmin } from '@/lib/supabase.js';
import { createSupabaseCloudAdapter } from '@/services/cloud.storage.js';
import { BackendError } from '@/types/index.js';

import {
  createTempDir,
  removeTempDir,
  writeTestFile,
} from '../../helpers/test-utils.js';

const SUPABASE = {
  url: 'https://project.supabase.test',
  serviceKey: 'test-service-key',
};

describe('Supabase cloud adapter', () => {
  let dir: string;
  let fetchMock: Mock<typeof fetch>;

  beforeEach(async () => {
    dir = await createTempDir();
    fetchMock = vi.fn<typeof fetch>();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function adapter() {
    return createSupabaseCloudAdapter(
      createSupabaseAdmin(SUPABASE, fetchMock),
      'file-backups'
    );
  }

  describe('upload()', () => {
    it('should upload the object and return its public URL', async () => {
      const filePath = await writeTestFile(dir, 'f1_notes.txt.gz', 'payload');
      fetchMock.mockResolvedValueOnce(
        Response.json({
          Key: 'file-backups/user_owner-1/f1_notes.txt.gz',
          Id: 'object-1',
        })
      );

      const publicUrl = await adapter().upload(
        filePath,
        'user_owner-1/f1_notes.txt.gz'
      );

      expect(publicUrl).toBe(
        'https://project.supabase.test/storage/v1/object/public/file-backups/user_owner-1/f1_notes.txt.gz'
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(String(url)).toBe(
        'https://project.supabase.test/storage/v1/object/file-backups/user_owner-1/f1_notes.txt.gz'
      );
      expect(init?.method).toBe('POST');
    });

    it('should raise a BackendError when the bucket refuses the upload', async () => {
      const filePath = await writeTestFile(dir, 'f1_notes.txt.gz', 'payload');
      fetchMock.mockResolvedValueOnce(
        Response.json(
          {
            statusCode: '409',
            error: 'Duplicate',
            message: 'The resource already exists',
          },
          { status: 409 }
        )
      );

      const pending = adapter().upload(filePath, 'user_owner-1/f1_notes.txt.gz');

      await expect(pending).rejects.toBeInstanceOf(BackendError);
      await expect(pending).rejects.toThrow(/^Failed to upload to bucket: /);
    });
  });

  describe('delete()', () => {
    it('should remove the object', async () => {
      fetchMock.mockResolvedValueOnce(Response.json([]));

      await adapter().delete('user_owner-1/f1_notes.txt.gz');

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(String(url)).toBe(
        'https://project.supabase.test/storage/v1/object/file-backups'
      );
      expect(init?.method).toBe('DELETE');
    });

    it('should raise a BackendError when removal fails', async () => {
      fetchMock.mockResolvedValueOnce(
        Response.json({ message: 'storage offline' }, { status: 500 })
      );

      await expect(
        adapter().delete('user_owner-1/f1_notes.txt.gz')
      ).rejects.toMatchObject({ backend: 'cloud' });
    });
  });
});
