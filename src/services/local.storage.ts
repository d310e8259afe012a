/**
 * Local Backup Store
 *
 * Keeps a compressed copy of every upload under
 * <rootDir>/user_<ownerId>/<name>. This copy is the durability
 * floor: if it cannot be written, the upload fails.
 */

import { copyFile, mkdir, readdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';

import { escapeKeySegment } from '../lib/format.js';

export interface LocalStorageUsage {
  fileCount: number;
  totalBytes: number;
}

/**
 * LocalStore interface
 */
export interface LocalStore {
  readonly rootDir: string;
  ownerDir(ownerId: string): string;
  /** Copies sourcePath to <ownerDir>/<fileName> and returns the stored path */
  save(sourcePath: string, ownerId: string, fileName: string): Promise<string>;
  exists(storedPath: string): Promise<boolean>;
  remove(storedPath: string): Promise<void>;
  usage(): Promise<LocalStorageUsage>;
}

/**
 * Directory name for an owner's backups, one per distinct ownerId
 */
export function ownerDirName(ownerId: string): string {
  return `user_${escapeKeySegment(ownerId)}`;
}

async function walk(dir: string, totals: LocalStorageUsage): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(entryPath, totals);
    } else if (entry.isFile()) {
      const info = await stat(entryPath);
      totals.fileCount += 1;
      totals.totalBytes += info.size;
    }
  }
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    const info = await stat(dir);
    return info.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Create LocalStore rooted at rootDir
 */
export function createLocalStore(deps: { rootDir: string }): LocalStore {
  const rootDir = path.resolve(deps.rootDir);

  function ownerDir(ownerId: string): string {
    return path.join(rootDir, ownerDirName(ownerId));
  }

  return {
    rootDir,

    ownerDir,

    async save(
      sourcePath: string,
      ownerId: string,
      fileName: string
    ): Promise<string> {
      const targetDir = ownerDir(ownerId);
      await mkdir(targetDir, { recursive: true });

      const storedPath = path.join(targetDir, path.basename(fileName));
      await copyFile(sourcePath, storedPath);
      return storedPath;
    },

    async exists(storedPath: string): Promise<boolean> {
      try {
        const info = await stat(storedPath);
        return info.isFile();
      } catch {
        return false;
      }
    },

    async remove(storedPath: string): Promise<void> {
      await rm(storedPath, { force: true });
    },

    async usage(): Promise<LocalStorageUsage> {
      const totals: LocalStorageUsage = { fileCount: 0, totalBytes: 0 };
      if (!(await isDirectory(rootDir))) {
        return totals;
      }
      await walk(rootDir, totals);
      return totals;
    },
  };
}
