import type { InStatement } from '@libsql/client';
import { placeholderName, upsertUser } from '../storage/upsert.js';
import type { ImportContext } from '../types.js';
import type { MessageEntry } from './entries.js';

/**
 * Upsert for a message's sender. The name on the line wins, then the
 * contacts index, then the placeholder.
 */
export async function upsertSender(entry: MessageEntry, ctx: ImportContext): Promise<InStatement> {
  const name =
    entry.dName ||
    (await ctx.resolver.lookup(entry.fromUid, 'user')) ||
    placeholderName('user', entry.fromUid);
  return upsertUser(entry.fromUid, name);
}
