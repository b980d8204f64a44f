/**
 * Upsert statements for the target store.
 *
 * Names (servers, channels, users) only ever improve: a stored placeholder
 * ("User #<id>" / "Group #<id>") is replaced by a real name, never the other
 * way round. Every other table is first-write-wins.
 */

import type { InStatement } from '@libsql/client';
import type { ConversationKind, LookupKind } from '../types.js';

const PLACEHOLDER_PATTERN = /^(?:User|Group) #\d+$/;

/**
 * SQL predicate equivalent to isPlaceholderName() for a column expression.
 */
function placeholderSql(column: string): string {
  return (
    `((${column} GLOB 'User #[0-9]*' AND ${column} NOT GLOB 'User #*[^0-9]*')` +
    ` OR (${column} GLOB 'Group #[0-9]*' AND ${column} NOT GLOB 'Group #*[^0-9]*'))`
  );
}

/** Update clause shared by every named table */
function improveNameClause(table: string): string {
  return (
    `ON CONFLICT (id) DO UPDATE SET name = excluded.name ` +
    `WHERE ${placeholderSql(`${table}.name`)} AND NOT ${placeholderSql('excluded.name')}`
  );
}

export function isPlaceholderName(name: string): boolean {
  return PLACEHOLDER_PATTERN.test(name);
}

export function placeholderName(kind: LookupKind, id: bigint): string {
  return kind === 'group' ? `Group #${id}` : `User #${id}`;
}

// ─── Named records ───────────────────────────────────────────

export function upsertServer(id: bigint, name: string, kind: ConversationKind): InStatement {
  return {
    sql: `INSERT INTO servers (id, name, type) VALUES (?, ?, ?) ${improveNameClause('servers')}`,
    args: [id, name, kind],
  };
}

/** Every conversation is a one-channel server: the channel's server is itself. */
export function upsertChannel(id: bigint, name: string): InStatement {
  return {
    sql: `INSERT INTO channels (id, server, name) VALUES (?, ?, ?) ${improveNameClause('channels')}`,
    args: [id, id, name],
  };
}

export function upsertUser(id: bigint, name: string): InStatement {
  return {
    sql:
      'INSERT INTO users (id, name, display_name, avatar_url, discriminator) ' +
      `VALUES (?, ?, NULL, NULL, NULL) ${improveNameClause('users')}`,
    args: [id, name],
  };
}

// ─── First-write-wins records ────────────────────────────────

export interface MessageRow {
  messageId: bigint;
  senderId: bigint;
  channelId: bigint;
  text: string;
  timestamp: bigint;
}

export function insertMessage(row: MessageRow): InStatement {
  return {
    sql:
      'INSERT INTO messages (message_id, sender_id, channel_id, text, timestamp) ' +
      'VALUES (?, ?, ?, ?, ?) ON CONFLICT DO NOTHING',
    args: [row.messageId, row.senderId, row.channelId, row.text, row.timestamp],
  };
}

export interface AttachmentRow {
  attachmentId: bigint;
  name: string;
  type: string;
  url: string;
  size: number;
  width: number | null;
  height: number | null;
}

/** The origin URL doubles as normalized and download URL. */
export function insertAttachment(row: AttachmentRow): InStatement {
  return {
    sql:
      'INSERT INTO attachments (attachment_id, name, type, normalized_url, download_url, size, width, height) ' +
      'VALUES (?, ?, ?, ?, ?, ?, ?, ?) ON CONFLICT DO NOTHING',
    args: [row.attachmentId, row.name, row.type, row.url, row.url, row.size, row.width, row.height],
  };
}

export function insertMessageAttachment(messageId: bigint, attachmentId: bigint): InStatement {
  return {
    sql: 'INSERT INTO message_attachments (message_id, attachment_id) VALUES (?, ?) ON CONFLICT DO NOTHING',
    args: [messageId, attachmentId],
  };
}

export function insertReply(messageId: bigint, repliedToId: bigint): InStatement {
  return {
    sql: 'INSERT INTO message_replied_to (message_id, replied_to_id) VALUES (?, ?) ON CONFLICT DO NOTHING',
    args: [messageId, repliedToId],
  };
}

/** HTTP status recorded for blobs read from the backup */
export const DOWNLOAD_STATUS_OK = 200;

/**
 * Cache a media file that was found on disk: blob plus its metadata row.
 */
export function insertDownload(url: string, type: string, blob: Buffer): InStatement[] {
  return [
    {
      sql: 'INSERT INTO download_metadata (normalized_url, download_url, status, type, size) VALUES (?, ?, ?, ?, ?) ON CONFLICT DO NOTHING',
      args: [url, url, DOWNLOAD_STATUS_OK, type, blob.length],
    },
    {
      sql: 'INSERT INTO download_blobs (normalized_url, blob) VALUES (?, ?) ON CONFLICT DO NOTHING',
      args: [url, blob],
    },
  ];
}
