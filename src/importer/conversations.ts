/**
 * Conversation Importer
 *
 * Each conversation log line becomes one server and its single channel.
 */

import { placeholderName, upsertChannel, upsertServer } from '../storage/upsert.js';
import type { TargetStore } from '../storage/target.js';
import type { ImportContext, LogImportStats, LookupKind } from '../types.js';
import { ConversationEntrySchema, parseConversationId, parseEntry } from './entries.js';
import { importLog, type RecordWrite } from './log.js';

export async function buildConversationRecord(
  value: unknown,
  ctx: ImportContext,
): Promise<RecordWrite> {
  const entry = parseEntry(ConversationEntrySchema, value);
  const conversation = parseConversationId(entry.userId);
  const kind: LookupKind = conversation.kind === 'GROUP' ? 'group' : 'user';

  const name =
    (await ctx.resolver.lookup(conversation.id, kind)) ?? placeholderName(kind, conversation.id);

  return {
    statements: [
      upsertServer(conversation.id, name, conversation.kind),
      upsertChannel(conversation.id, name),
    ],
  };
}

export function importConversations(
  path: string,
  store: TargetStore,
  ctx: ImportContext,
  onProgress?: (lines: number) => void,
): Promise<LogImportStats> {
  return importLog(path, store, (value) => buildConversationRecord(value, ctx), onProgress);
}
