/**
 * Image messages (type 2).
 *
 * The message row is written with empty text and committed on its own;
 * the attachment is built afterwards, so a bad payload still leaves the
 * message in place. If the backup contains the picture itself, its bytes are
 * cached as a download so the viewer doesn't need the network.
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { join, posix } from 'node:path';
import type { InStatement } from '@libsql/client';
import { z } from 'zod';
import { FormatError } from '../errors.js';
import {
  insertAttachment,
  insertDownload,
  insertMessage,
  insertMessageAttachment,
} from '../storage/upsert.js';
import type { ConversationId, ImportContext } from '../types.js';
import { parseConversationId, type MessageEntry } from './entries.js';
import type { RecordWrite } from './log.js';
import { upsertSender } from './participants.js';

const DEFAULT_EXTENSION = 'jpg';

const DimensionSchema = z
  .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/).transform(Number)])
  .nullish();

const ImageParamsSchema = z
  .object({
    width: DimensionSchema,
    height: DimensionSchema,
  })
  .passthrough();

const ImagePayloadSchema = z
  .object({
    oriUrl: z.string().min(1).nullish(),
    href: z.string().min(1).nullish(),
    /** Either an object or the same object serialized as JSON */
    params: z.union([z.string(), z.record(z.string(), z.unknown())]).nullish(),
  })
  .passthrough();

export interface MediaInfo {
  /** Original URL of the image */
  url: string;
  /** File name taken from the URL */
  name: string;
  /** Lower-case extension without the dot */
  extension: string;
  /** MIME type derived from the extension */
  type: string;
  /** MD5 of the URL, as used in on-disk media names */
  hash: string;
}

export function mimeTypeFor(extension: string): string {
  return `image/${extension === 'jpg' ? 'jpeg' : extension}`;
}

/** Percent-decoded segment, or the segment as is when it isn't valid encoding */
function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function describeMedia(url: string): MediaInfo {
  let encoded: string;
  try {
    encoded = posix.basename(new URL(url).pathname);
  } catch (err) {
    throw new FormatError(`Invalid image URL: ${url}`, { cause: err });
  }
  const base = decodePathSegment(encoded);

  const hash = createHash('md5').update(url).digest('hex');
  const extension = posix.extname(base).slice(1).toLowerCase() || DEFAULT_EXTENSION;

  return {
    url,
    name: base || `${hash}.${extension}`,
    extension,
    type: mimeTypeFor(extension),
    hash,
  };
}

/**
 * Where the backup keeps the picture for a message:
 * `<out>/<account>/<downloads>/picture/<channel>[_group]/z<msgId>_<md5(url)>.<ext>`
 */
export function mediaPath(
  ctx: ImportContext,
  channel: ConversationId,
  messageId: bigint,
  media: MediaInfo,
): string {
  const channelDir = channel.kind === 'GROUP' ? `${channel.id}_group` : `${channel.id}`;
  return join(
    ctx.outputDir,
    ctx.accountId,
    ctx.config.downloadsDir,
    'picture',
    channelDir,
    `z${messageId}_${media.hash}.${media.extension}`,
  );
}

/**
 * Read a media file; `undefined` when the backup doesn't contain it.
 */
export async function readMedia(path: string): Promise<Buffer | undefined> {
  try {
    return await readFile(path);
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Width and height from the payload params, `null` when not given.
 */
export function imageDimensions(
  params: string | Record<string, unknown> | null | undefined,
  recordId: string,
): { width: number | null; height: number | null } {
  if (params === null || params === undefined || params === '') {
    return { width: null, height: null };
  }

  let raw: unknown = params;
  if (typeof params === 'string') {
    try {
      raw = JSON.parse(params);
    } catch (err) {
      throw new FormatError('Image params are not valid JSON', { recordId, cause: err });
    }
  }

  const parsed = ImageParamsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FormatError('Unexpected image params shape', { recordId, cause: parsed.error });
  }
  return { width: parsed.data.width ?? null, height: parsed.data.height ?? null };
}

export async function buildImageMessage(entry: MessageEntry, ctx: ImportContext): Promise<RecordWrite> {
  const channel = parseConversationId(entry.toUid);

  return {
    statements: [
      await upsertSender(entry, ctx),
      insertMessage({
        messageId: entry.cliMsgId,
        senderId: entry.fromUid,
        channelId: channel.id,
        text: '',
        timestamp: entry.serverTime,
      }),
    ],
    followUp: () => buildImageAttachment(entry, channel, ctx),
  };
}

/**
 * Attachment, link and cached download rows for an image message.
 */
export async function buildImageAttachment(
  entry: MessageEntry,
  channel: ConversationId,
  ctx: ImportContext,
): Promise<InStatement[]> {
  const recordId = String(entry.cliMsgId);
  const payload = ImagePayloadSchema.safeParse(entry.message);
  if (!payload.success) {
    throw new FormatError('Unexpected image payload shape', { recordId, cause: payload.error });
  }
  const url = payload.data.oriUrl ?? payload.data.href;
  if (!url) {
    throw new FormatError('Image payload has no URL', { recordId });
  }

  const media = describeMedia(url);
  const blob = await readMedia(mediaPath(ctx, channel, entry.cliMsgId, media));
  const { width, height } = imageDimensions(payload.data.params, recordId);

  const statements: InStatement[] = [
    insertAttachment({
      attachmentId: entry.cliMsgId,
      name: media.name,
      type: media.type,
      url: media.url,
      size: blob?.length ?? 0,
      width,
      height,
    }),
    insertMessageAttachment(entry.cliMsgId, entry.cliMsgId),
  ];

  if (blob) {
    statements.push(...insertDownload(media.url, media.type, blob));
  }

  return statements;
}
