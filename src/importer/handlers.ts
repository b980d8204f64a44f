/**
 * Message type dispatch.
 *
 * Every known `msgType` has an entry here. Types that are not modeled map
 * to explicit no-ops; adding support for one means swapping its entry, not
 * touching the others. Unknown types fall through to a no-op as well.
 */

import type { ImportContext } from '../types.js';
import type { MessageEntry } from './entries.js';
import { buildImageMessage } from './image.js';
import type { RecordWrite } from './log.js';
import { buildTextMessage } from './text.js';

export type MessageHandler =
  | { kind: 'noop'; label: string }
  | {
      kind: 'record';
      label: string;
      build: (entry: MessageEntry, ctx: ImportContext) => Promise<RecordWrite>;
    };

const noop = (label: string): MessageHandler => ({ kind: 'noop', label });

export const MESSAGE_HANDLERS: ReadonlyMap<number, MessageHandler> = new Map<number, MessageHandler>([
  [1, { kind: 'record', label: 'text', build: buildTextMessage }],
  [2, { kind: 'record', label: 'image', build: buildImageMessage }],
  [3, noop('voice')],
  [4, noop('sticker')],
  [6, noop('link')],
  [7, noop('gif')],
  [17, noop('location')],
  [18, noop('video')],
  [19, noop('file')],
  [20, { kind: 'record', label: 'rich text or recalled', build: buildTextMessage }],
  [21, noop('embed')],
  [25, noop('friend request accepted')],
  [26, noop('poll')],
  [52, noop('instant payload')],
  [-1909, noop('pinned message')],
  [-27, noop('deleted message')],
  [-4, noop('member joined or left')],
]);

export const UNKNOWN_MESSAGE_HANDLER: MessageHandler = noop('unknown');

export function handlerFor(msgType: number): MessageHandler {
  return MESSAGE_HANDLERS.get(msgType) ?? UNKNOWN_MESSAGE_HANDLER;
}
