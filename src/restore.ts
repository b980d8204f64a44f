/**
 * Backup Restore
 *
 * Decrypts and unpacks a backup container, then imports its logs into the
 * target store.
 *
 * Flow:
 * 1. Derive key + IV from the passphrase and container filename
 * 2. Stream-decrypt the container into a scratch file
 * 3. Check for a tar header (catches wrong passphrases), then extract
 * 4. Import the conversation log
 * 5. Import the message log
 *
 * The store and resolver belong to the caller and are left open.
 */

import { existsSync } from 'node:fs';
import { basename } from 'node:path';
import { defaultConfig } from './config.js';
import { decryptContainer, deriveKeySchedule } from './encryption.js';
import { FormatError } from './errors.js';
import { assertTarPayload, logPaths, outputDirFor, unpackArchive } from './format.js';
import { importConversations } from './importer/conversations.js';
import { importMessages } from './importer/messages.js';
import { NullNameResolver } from './resolver.js';
import type { TargetStore } from './storage/target.js';
import type {
  ImportConfig,
  ImportContext,
  ImportEventHandler,
  ImportPhase,
  ImportResult,
  NameResolver,
} from './types.js';

export interface RestoreOptions {
  /** Raw passphrase bytes */
  passphrase: Buffer;
  containerPath: string;
  store: TargetStore;
  /** Contacts index; names fall back to placeholders without one */
  resolver?: NameResolver;
  config?: ImportConfig;
  onEvent?: ImportEventHandler;
  /** Called with the scratch directory as soon as it exists, for cleanup on interrupt */
  onScratchCreated?: (dir: string) => void;
}

export interface ExtractHooks {
  onScratchCreated?: (dir: string) => void;
  /** Called once the payload is decrypted and recognized as a tar archive */
  onDecrypted?: () => void;
}

/**
 * Decrypt a container and extract it next to itself.
 *
 * @returns The account id and the directory the backup was extracted to
 */
export async function extractBackup(
  passphrase: Buffer,
  containerPath: string,
  config: ImportConfig,
  hooks: ExtractHooks = {},
): Promise<{ accountId: string; outputDir: string }> {
  const schedule = deriveKeySchedule(passphrase, containerPath);
  const scratch = await decryptContainer(containerPath, schedule, {
    chunkSize: config.chunkSize,
    scratchDir: config.scratchDir,
    onScratchCreated: hooks.onScratchCreated,
  });

  try {
    await assertTarPayload(scratch.path);
    hooks.onDecrypted?.();
    const outputDir = outputDirFor(containerPath);
    const accountId = await unpackArchive(scratch.path, outputDir);
    return { accountId, outputDir };
  } finally {
    await scratch.dispose();
  }
}

/**
 * Restore a backup container into the target store.
 */
export async function restoreBackup(options: RestoreOptions): Promise<ImportResult> {
  const config = options.config ?? defaultConfig();
  const resolver = options.resolver ?? new NullNameResolver();
  const emit: ImportEventHandler = options.onEvent ?? (() => {});
  const { containerPath, store } = options;

  let phase: ImportPhase = 'decrypting';
  try {
    emit({ type: 'phase:start', phase, message: `Decrypting ${basename(containerPath)}` });
    const { accountId, outputDir } = await extractBackup(options.passphrase, containerPath, config, {
      onScratchCreated: options.onScratchCreated,
      onDecrypted: () => {
        emit({ type: 'phase:complete', phase, message: 'Decrypted' });
        phase = 'extracting';
        emit({ type: 'phase:start', phase, message: `Extracting to ${outputDirFor(containerPath)}` });
      },
    });
    emit({ type: 'phase:complete', phase, message: `Extracted account ${accountId} to ${outputDir}` });

    const logs = logPaths(outputDir, accountId, config.downloadsDir);
    for (const path of [logs.conversations, logs.messages]) {
      if (!existsSync(path)) {
        throw new FormatError('Backup is missing a log file', { file: path });
      }
    }

    const ctx: ImportContext = { accountId, outputDir, config, resolver };

    phase = 'conversations';
    emit({ type: 'phase:start', phase, message: 'Importing conversations' });
    const conversations = await importConversations(logs.conversations, store, ctx, (lines) =>
      emit({ type: 'progress', phase, lines, message: `Importing conversations (${lines} lines)` }),
    );
    emit({ type: 'phase:complete', phase, message: `Imported ${conversations.committed} conversations` });

    phase = 'messages';
    emit({ type: 'phase:start', phase, message: 'Importing messages' });
    const messages = await importMessages(logs.messages, store, ctx, (lines) =>
      emit({ type: 'progress', phase, lines, message: `Importing messages (${lines} lines)` }),
    );
    emit({ type: 'phase:complete', phase, message: `Imported ${messages.committed} messages` });

    const result: ImportResult = { accountId, outputDir, conversations, messages };
    emit({ type: 'complete', result });
    return result;
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    emit({ type: 'error', phase, error });
    throw error;
  }
}
