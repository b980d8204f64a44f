/**
 * Backup Import Types
 *
 * Shared shapes for the decrypt → extract → import pipeline.
 * Structure: tar → AES-256-CBC encrypted → <name>.<suffix>[.<suffix>...]
 */

// ─── Conversations ───────────────────────────────────────────

/** Server kind as stored in the target `servers.type` column */
export type ConversationKind = 'DM' | 'GROUP';

/**
 * A conversation id as it appears in the logs, parsed once.
 * Group ids carry a literal `g` prefix in the logs; `id` never does.
 */
export interface ConversationId {
  kind: ConversationKind;
  id: bigint;
  /** The id exactly as it appeared in the log */
  raw: string;
}

// ─── Name resolution ─────────────────────────────────────────

/** What a display name is being looked up for */
export type LookupKind = 'user' | 'group';

export interface NameResolver {
  /** Resolve a display name; `undefined` when nothing is known about the id. */
  lookup(id: bigint, kind: LookupKind): Promise<string | undefined>;
  close(): void;
}

// ─── Configuration ───────────────────────────────────────────

export interface ImportConfig {
  /** Read size for the container, in bytes. Must be a multiple of 16. */
  chunkSize: number;
  /** Name of the downloads directory under the account directory */
  downloadsDir: string;
  /** Text stored for recalled (type 20) messages without a title */
  recalledMessageText: string;
  /** Directory for the decryption scratch file (default: OS temp dir) */
  scratchDir?: string;
}

// ─── Progress ────────────────────────────────────────────────

export type ImportPhase = 'decrypting' | 'extracting' | 'conversations' | 'messages';

export type ImportEventType =
  | 'phase:start'
  | 'phase:complete'
  | 'progress'
  | 'complete'
  | 'error';

export interface ImportEvent {
  type: ImportEventType;
  phase?: ImportPhase;
  message?: string;
  /** Lines processed so far in the current log */
  lines?: number;
  error?: Error;
  result?: ImportResult;
}

export type ImportEventHandler = (event: ImportEvent) => void;

// ─── Results ─────────────────────────────────────────────────

export interface LogImportStats {
  /** Non-empty lines read */
  lines: number;
  /** Lines whose records were written */
  committed: number;
  /** Lines acknowledged without writing anything (no-op message types) */
  skipped: number;
}

export interface ImportResult {
  accountId: string;
  outputDir: string;
  conversations: LogImportStats;
  messages: LogImportStats;
}

// ─── Import context ──────────────────────────────────────────

/** Everything a record importer needs besides the record itself */
export interface ImportContext {
  /** Owner of the backup (the archive's top-level directory) */
  accountId: string;
  /** Directory the backup was extracted to */
  outputDir: string;
  config: ImportConfig;
  resolver: NameResolver;
}
