/**
 * Text-like messages (types 1 and 20).
 */

import { FormatError } from '../errors.js';
import { insertMessage } from '../storage/upsert.js';
import type { ImportContext } from '../types.js';
import { parseConversationId, type MessageEntry } from './entries.js';
import type { RecordWrite } from './log.js';
import { upsertSender } from './participants.js';

const RICH_TEXT_ACTION = 'rtf';
const RECALLED_MESSAGE_TYPE = 20;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text of a text-like message.
 *
 * The payload is either the text itself or an object; rich-text objects
 * carry their text in `title`. A type 20 object without one is a recalled
 * message. Any other object shape is not understood and is rejected rather
 * than guessed at.
 */
export function messageText(entry: MessageEntry, recalledText: string): string {
  const payload = entry.message;
  if (typeof payload === 'string') {
    return payload;
  }

  if (isRecord(payload) && payload.action === RICH_TEXT_ACTION && typeof payload.title === 'string') {
    return payload.title;
  }

  if (entry.msgType === RECALLED_MESSAGE_TYPE) {
    return recalledText;
  }

  throw new FormatError(
    `Unsupported payload for message type ${entry.msgType}: ${JSON.stringify(payload)}`,
    { recordId: String(entry.cliMsgId) },
  );
}

export async function buildTextMessage(entry: MessageEntry, ctx: ImportContext): Promise<RecordWrite> {
  const text = messageText(entry, ctx.config.recalledMessageText);
  const channel = parseConversationId(entry.toUid);

  return {
    statements: [
      await upsertSender(entry, ctx),
      insertMessage({
        messageId: entry.cliMsgId,
        senderId: entry.fromUid,
        channelId: channel.id,
        text,
        timestamp: entry.serverTime,
      }),
    ],
  };
}
