/**
 * Message Importer
 *
 * Dispatches each message log line on its `msgType`. Lines whose type is
 * not modeled are acknowledged without writing anything, including their
 * reply link.
 */

import type { InStatement } from '@libsql/client';
import { insertReply, placeholderName, upsertUser } from '../storage/upsert.js';
import type { TargetStore } from '../storage/target.js';
import type { ImportContext, LogImportStats } from '../types.js';
import {
  MessageEntrySchema,
  MessageEnvelopeSchema,
  parseEntry,
  parseUserId,
  type MessageEntry,
  type Quote,
} from './entries.js';
import { handlerFor } from './handlers.js';
import { importLog, type RecordWrite } from './log.js';

/** Quote owner id meaning "the owner of this backup" */
export const SELF_OWNER_ID = '0';

/**
 * Reply link for a quoting message, plus a user row for the quoted owner.
 */
export function buildReply(entry: MessageEntry, quote: Quote, ctx: ImportContext): InStatement[] {
  const ownerId = parseUserId(quote.ownerId === SELF_OWNER_ID ? ctx.accountId : quote.ownerId);
  const ownerName = quote.fromD || placeholderName('user', ownerId);

  return [
    upsertUser(ownerId, ownerName),
    insertReply(entry.cliMsgId, quote.cliMsgId),
  ];
}

export async function buildMessageRecord(
  value: unknown,
  ctx: ImportContext,
): Promise<RecordWrite | null> {
  const { msgType } = parseEntry(MessageEnvelopeSchema, value);
  const handler = handlerFor(msgType);
  if (handler.kind === 'noop') {
    return null;
  }

  const entry = parseEntry(MessageEntrySchema, value);
  const reply = entry.quote ? buildReply(entry, entry.quote, ctx) : [];
  const record = await handler.build(entry, ctx);
  return { ...record, statements: [...reply, ...record.statements] };
}

export function importMessages(
  path: string,
  store: TargetStore,
  ctx: ImportContext,
  onProgress?: (lines: number) => void,
): Promise<LogImportStats> {
  return importLog(path, store, (value) => buildMessageRecord(value, ctx), onProgress);
}
