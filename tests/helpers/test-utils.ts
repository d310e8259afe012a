/**
 * Test Utilities
 * Temp directories, a silent logger and in-memory backends
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import pino from 'pino';

import type {
  ChannelUpload,
  StorageServiceChannel,
  StorageServiceCloud,
} from '@/services/storage.service.js';
import type { ChannelMessageRef } from '@/types/index.js';
import { BackendError } from '@/types/index.js';

/**
 * Logger that discards everything
 */
export function silentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}

export async function createTempDir(prefix: string = 'relay-test-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a file under dir and return its path
 */
export async function writeTestFile(
  dir: string,
  name: string,
  content: string | Buffer
): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, content);
  return filePath;
}

/**
 * Compressible text of roughly the requested size
 */
export function repeatedText(bytes: number): string {
  const line = 'the quick brown fox jumps over the lazy dog\n';
  return line.repeat(Math.ceil(bytes / line.length)).slice(0, bytes);
}

export interface FakeChannel extends StorageServiceChannel {
  messages: Map<number, Buffer>;
  captions: string[];
  failUploads: boolean;
  failFetches: boolean;
  failDeletes: boolean;
  /** Resolve uploads only after this many ms */
  uploadDelayMs: number;
  deleted: number[];
}

/**
 * Channel backend kept in memory; messages are numbered from 1
 */
export function createFakeChannel(channelId: string = '-1001234567890'): FakeChannel {
  let nextMessageId = 1;

  const fake: FakeChannel = {
    channelId,
    messages: new Map(),
    captions: [],
    failUploads: false,
    failFetches: false,
    failDeletes: false,
    uploadDelayMs: 0,
    deleted: [],

    async upload(filePath: string, caption: string): Promise<ChannelUpload> {
      if (fake.uploadDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, fake.uploadDelayMs));
      }
      if (fake.failUploads) {
        throw new BackendError('channel', 'channel offline');
      }
      const messageId = nextMessageId++;
      fake.messages.set(messageId, await readFile(filePath));
      fake.captions.push(caption);
      return {
        ref: { channelId, messageId, fileId: `doc-${messageId}` },
        publicLocator: `https://t.me/c/1234567890/${messageId}`,
      };
    },

    async fetch(ref: ChannelMessageRef, destPath: string): Promise<void> {
      const payload = fake.messages.get(ref.messageId);
      if (fake.failFetches || payload === undefined) {
        throw new BackendError('channel', 'message unavailable');
      }
      await writeFile(destPath, payload);
    },

    async delete(ref: ChannelMessageRef): Promise<void> {
      if (fake.failDeletes) {
        throw new BackendError('channel', 'delete refused');
      }
      fake.messages.delete(ref.messageId);
      fake.deleted.push(ref.messageId);
    },
  };

  return fake;
}

export interface FakeCloud extends StorageServiceCloud {
  objects: Map<string, Buffer>;
  failUploads: boolean;
  /** Upload succeeds but yields no public link */
  returnNoLink: boolean;
  deleted: string[];
}

/**
 * Cloud bucket kept in memory
 */
export function createFakeCloud(): FakeCloud {
  const fake: FakeCloud = {
    objects: new Map(),
    failUploads: false,
    returnNoLink: false,
    deleted: [],

    async upload(filePath: string, objectPath: string): Promise<string | null> {
      if (fake.failUploads) {
        throw new BackendError('cloud', 'bucket unavailable');
      }
      fake.objects.set(objectPath, await readFile(filePath));
      if (fake.returnNoLink) {
        return null;
      }
      return `https://cloud.test/public/${objectPath}`;
    },

    async delete(objectPath: string): Promise<void> {
      fake.objects.delete(objectPath);
      fake.deleted.push(objectPath);
    },
  };

  return fake;
}
