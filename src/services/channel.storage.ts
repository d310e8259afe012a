/**
 * Telegram Channel Adapter
 * Implementation of StorageServiceChannel over the Telegram Bot API
 *
 * Payloads are posted as documents into a private storage channel.
 * Point apiUrl at a self-hosted Bot API server to lift the public
 * API's transfer limits.
 */

import { copyFile, rm } from 'node:fs/promises';
import { createWriteStream, openAsBlob } from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';

import { z } from 'zod';

import type { ChannelConfig } from '../lib/config.js';
import type { ChannelMessageRef } from '../types/index.js';
import { BackendError } from '../types/index.js';

import type { ChannelUpload, StorageServiceChannel } from './storage.service.js';

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

const sentMessageSchema = z.object({
  message_id: z.number().int(),
  document: z.object({
    file_id: z.string(),
  }),
});

const remoteFileSchema = z.object({
  file_id: z.string(),
  file_path: z.string().optional(),
});

const deleteResultSchema = z.boolean();

/**
 * Public t.me link for a message in a private channel
 */
export function channelMessageLink(channelId: string, messageId: number): string {
  return `https://t.me/c/${channelId.replace(/^-100/, '')}/${messageId}`;
}

/**
 * Create Telegram channel adapter
 */
export function createTelegramChannelAdapter(
  config: ChannelConfig,
  fetchImpl: typeof fetch = fetch
): StorageServiceChannel {
  const apiBase = `${config.apiUrl}/bot${config.botToken}`;
  const fileBase = `${config.apiUrl}/file/bot${config.botToken}`;

  /**
   * Call a Bot API method and validate its result
   */
  async function callApi<T>(
    method: string,
    body: FormData | URLSearchParams,
    resultSchema: z.ZodType<T>,
    signal: AbortSignal
  ): Promise<T> {
    let response: Response;
    try {
      response = await fetchImpl(`${apiBase}/${method}`, {
        method: 'POST',
        body,
        signal,
      });
    } catch (error) {
      throw new BackendError('channel', `${method} request failed`, {
        cause: error,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new BackendError(
        'channel',
        `${method} returned HTTP ${response.status} without a JSON body`,
        { cause: error }
      );
    }

    const envelope = envelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new BackendError('channel', `${method} returned an unexpected body`);
    }
    if (!envelope.data.ok) {
      throw new BackendError(
        'channel',
        `${method} failed: ${envelope.data.description ?? `HTTP ${response.status}`}`
      );
    }

    const result = resultSchema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new BackendError('channel', `${method} returned an unexpected result`);
    }
    return result.data;
  }

  return {
    channelId: config.channelId,

    async upload(
      filePath: string,
      caption: string,
      signal: AbortSignal
    ): Promise<ChannelUpload> {
      const form = new FormData();
      form.append('chat_id', config.channelId);
      form.append('caption', caption);
      form.append('disable_content_type_detection', 'true');
      form.append('document', await openAsBlob(filePath), path.basename(filePath));

      const message = await callApi(
        'sendDocument',
        form,
        sentMessageSchema,
        signal
      );

      return {
        ref: {
          channelId: config.channelId,
          messageId: message.message_id,
          fileId: message.document.file_id,
        },
        publicLocator: channelMessageLink(config.channelId, message.message_id),
      };
    },

    async fetch(
      ref: ChannelMessageRef,
      destPath: string,
      signal: AbortSignal
    ): Promise<void> {
      const remote = await callApi(
        'getFile',
        new URLSearchParams({ file_id: ref.fileId }),
        remoteFileSchema,
        signal
      );
      if (remote.file_path === undefined) {
        throw new BackendError(
          'channel',
          `Message ${ref.messageId} has no downloadable file`
        );
      }

      // A local Bot API server hands out paths on its own disk
      if (path.isAbsolute(remote.file_path)) {
        await copyFile(remote.file_path, destPath);
        return;
      }

      let response: Response;
      try {
        response = await fetchImpl(`${fileBase}/${remote.file_path}`, { signal });
      } catch (error) {
        throw new BackendError('channel', 'File download request failed', {
          cause: error,
        });
      }
      if (!response.ok || response.body === null) {
        throw new BackendError(
          'channel',
          `File download failed with HTTP ${response.status}`
        );
      }

      try {
        await pipeline(response.body, createWriteStream(destPath), { signal });
      } catch (error) {
        await rm(destPath, { force: true });
        throw new BackendError('channel', 'File download was interrupted', {
          cause: error,
        });
      }
    },

    async delete(ref: ChannelMessageRef, signal: AbortSignal): Promise<void> {
      await callApi(
        'deleteMessage',
        new URLSearchParams({
          chat_id: ref.channelId,
          message_id: String(ref.messageId),
        }),
        deleteResultSchema,
        signal
      );
    },
  };
}
