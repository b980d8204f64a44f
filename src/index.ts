/**
 * zbackup-import
 *
 * Public API for programmatic usage.
 */

// Core types
export type {
  ConversationId,
  ConversationKind,
  ImportConfig,
  ImportContext,
  ImportEvent,
  ImportEventHandler,
  ImportEventType,
  ImportPhase,
  ImportResult,
  LogImportStats,
  LookupKind,
  NameResolver,
} from './types.js';

// Errors
export { FormatError, RecordImportError, StoreNotInitializedError } from './errors.js';

// Configuration
export { defaultConfig, loadConfig, parseConfig } from './config.js';

// Container
export { deriveKey, deriveIv, deriveKeySchedule, decryptContainer } from './encryption.js';
export type { KeySchedule, ScratchFile } from './encryption.js';
export { fileSuffixes, stripSuffixes, outputDirFor, logPaths, assertTarPayload, unpackArchive } from './format.js';

// Store + names
export { TargetStore, isPlaceholderName, placeholderName } from './storage/index.js';
export { NullNameResolver, IndexNameResolver, openNameResolver } from './resolver.js';

// Import
export { parseConversationId } from './importer/entries.js';
export { MESSAGE_HANDLERS, handlerFor } from './importer/handlers.js';
export type { MessageHandler } from './importer/handlers.js';
export type { RecordWrite } from './importer/log.js';
export { importConversations } from './importer/conversations.js';
export { importMessages } from './importer/messages.js';
export { restoreBackup, extractBackup } from './restore.js';
export type { ExtractHooks, RestoreOptions } from './restore.js';
