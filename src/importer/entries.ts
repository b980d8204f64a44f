/**
 * Log entry schemas.
 *
 * Only the fields the importers read are declared; everything else on a
 * line is carried through untouched.
 */

import { z } from 'zod';
import { FormatError } from '../errors.js';
import type { ConversationId } from '../types.js';

/** Prefix marking group ids in the logs */
export const GROUP_PREFIX = 'g';

const DIGITS = /^-?\d+$/;

/** Numeric id that may be written as a JSON number or a string */
const NumericIdSchema = z
  .union([z.number().int(), z.string().regex(DIGITS)])
  .transform((value) => BigInt(value));

const RawIdSchema = z.union([z.string(), z.number().int()]).transform(String);

export const ConversationEntrySchema = z
  .object({
    userId: RawIdSchema,
  })
  .passthrough();

export type ConversationEntry = z.infer<typeof ConversationEntrySchema>;

/** Just enough of a message line to pick a handler */
export const MessageEnvelopeSchema = z
  .object({
    msgType: z.union([z.number().int(), z.string().regex(DIGITS).transform(Number)]),
  })
  .passthrough();

export const QuoteSchema = z
  .object({
    /** Owner of the quoted message; "0" means the backup owner */
    ownerId: RawIdSchema,
    cliMsgId: NumericIdSchema,
    /** Display name of the quoted message's owner */
    fromD: z.string().nullish(),
  })
  .passthrough();

export type Quote = z.infer<typeof QuoteSchema>;

export const MessageEntrySchema = z
  .object({
    cliMsgId: NumericIdSchema,
    fromUid: NumericIdSchema,
    toUid: RawIdSchema,
    dName: z.string().nullish(),
    msgType: z.union([z.number().int(), z.string().regex(DIGITS).transform(Number)]),
    message: z.unknown(),
    serverTime: NumericIdSchema,
    quote: QuoteSchema.nullish(),
  })
  .passthrough();

export type MessageEntry = z.infer<typeof MessageEntrySchema>;

/**
 * Validate a parsed log line against a schema.
 */
export function parseEntry<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new FormatError(`Unexpected log entry shape: ${issues}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Parse a conversation id as written in the logs: `g<digits>` for groups,
 * `<digits>` for direct messages.
 */
export function parseConversationId(raw: string): ConversationId {
  const isGroup = raw.startsWith(GROUP_PREFIX);
  const digits = isGroup ? raw.slice(GROUP_PREFIX.length) : raw;
  if (!DIGITS.test(digits)) {
    throw new FormatError(`Invalid conversation id: ${JSON.stringify(raw)}`);
  }
  return { kind: isGroup ? 'GROUP' : 'DM', id: BigInt(digits), raw };
}

export function parseUserId(raw: string): bigint {
  if (!DIGITS.test(raw)) {
    throw new FormatError(`Invalid user id: ${JSON.stringify(raw)}`);
  }
  return BigInt(raw);
}
