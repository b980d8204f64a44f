/**
 * Backup Archive Format
 *
 * Unpacking: <name>.<suffix>... → decrypt → tar → <dir>/<name>/
 *
 * The tar holds exactly one top-level directory, named after the account:
 *   <account>/<downloads>/database/<account>_zconversation.zdb
 *   <account>/<downloads>/database/<account>_zmessage.zdb
 *   <account>/<downloads>/picture/<channel>[_group]/z<msgId>_<md5(url)>.<ext>
 */

import { createReadStream, createWriteStream, mkdirSync } from 'node:fs';
import { mkdir, open } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { finished, pipeline } from 'node:stream/promises';
import { Parser, type ReadEntry } from 'tar';
import { FormatError } from './errors.js';

const TAR_BLOCK_SIZE = 512;
const USTAR_MAGIC = Buffer.from('ustar', 'latin1');
const USTAR_MAGIC_OFFSET = 257;

/** Entry types that can be materialized */
const FILE_TYPES = new Set(['File', 'OldFile', 'ContiguousFile']);

/**
 * Filename suffixes, in order. A leading dot does not start a suffix and a
 * trailing dot means there are none: `a.tar.zl` → ['.tar', '.zl'].
 */
export function fileSuffixes(name: string): string[] {
  if (name.endsWith('.')) {
    return [];
  }
  const parts = name.replace(/^\.+/, '').split('.');
  return parts.slice(1).map((part) => `.${part}`);
}

/**
 * Filename with every suffix removed.
 */
export function stripSuffixes(name: string): string {
  const suffixes = fileSuffixes(name);
  const length = suffixes.reduce((total, suffix) => total + suffix.length, 0);
  return name.slice(0, name.length - length);
}

/**
 * Directory the container is extracted to: its own path minus all suffixes.
 */
export function outputDirFor(containerPath: string): string {
  return join(dirname(containerPath), stripSuffixes(basename(containerPath)));
}

/**
 * Paths of the two logs inside an extracted backup.
 */
export function logPaths(outputDir: string, accountId: string, downloadsDir: string) {
  const database = join(outputDir, accountId, downloadsDir, 'database');
  return {
    conversations: join(database, `${accountId}_zconversation.zdb`),
    messages: join(database, `${accountId}_zmessage.zdb`),
  };
}

/**
 * Check that a decrypted payload starts with a tar header.
 *
 * The container has no integrity check, so this is where a wrong
 * passphrase shows up.
 */
export async function assertTarPayload(payloadPath: string): Promise<void> {
  const handle = await open(payloadPath, 'r');
  try {
    const header = Buffer.alloc(TAR_BLOCK_SIZE);
    const { bytesRead } = await handle.read(header, 0, TAR_BLOCK_SIZE, 0);
    const magic = header.subarray(USTAR_MAGIC_OFFSET, USTAR_MAGIC_OFFSET + USTAR_MAGIC.length);
    if (bytesRead < TAR_BLOCK_SIZE || !magic.equals(USTAR_MAGIC)) {
      throw new FormatError(
        'Decrypted container is not a tar archive (wrong passphrase or not a backup container)',
      );
    }
  } finally {
    await handle.close();
  }
}

/**
 * Resolve where an entry lands inside `root`, or throw if it would escape.
 * Returns the path relative to `root` ('' for the root itself).
 */
export function resolveEntryPath(root: string, entryPath: string): string {
  const normalized = entryPath.replace(/\\/g, '/');
  if (isAbsolute(normalized) || /^[a-zA-Z]:/.test(normalized)) {
    throw new FormatError(`Archive entry has an absolute path: ${entryPath}`);
  }

  const rel = relative(root, resolve(root, normalized));
  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new FormatError(`Archive entry escapes the output directory: ${entryPath}`);
  }
  return rel;
}

/**
 * Extract a tar payload into `outputDir` and return the account id, i.e.
 * the name of the single top-level directory.
 *
 * Only regular files and directories are extracted; any other entry type
 * (links, devices, fifos) aborts the extraction. Existing files are
 * overwritten, so extracting the same payload twice gives the same tree.
 */
export async function unpackArchive(payloadPath: string, outputDir: string): Promise<string> {
  const root = resolve(outputDir);
  await mkdir(root, { recursive: true });

  /** top-level name → whether it is a directory */
  const topLevel = new Map<string, boolean>();
  const writes: Promise<void>[] = [];
  let writeError: unknown;
  let failure: FormatError | undefined;

  const materialize = (entry: ReadEntry): void => {
    const rel = resolveEntryPath(root, entry.path);
    if (rel === '') {
      entry.resume();
      return;
    }

    const segments = rel.split(sep);
    const isDirectory = entry.type === 'Directory';
    if (!isDirectory && !FILE_TYPES.has(entry.type)) {
      throw new FormatError(`Unsupported archive entry type ${entry.type}: ${entry.path}`);
    }
    topLevel.set(segments[0], (topLevel.get(segments[0]) ?? false) || isDirectory || segments.length > 1);

    const target = join(root, rel);
    if (isDirectory) {
      mkdirSync(target, { recursive: true });
      entry.resume();
      return;
    }

    mkdirSync(dirname(target), { recursive: true });
    const out = createWriteStream(target);
    entry.pipe(out);
    writes.push(
      finished(out).catch((err: unknown) => {
        writeError ??= err;
      }),
    );
  };

  const parser = new Parser({
    strict: true,
    onReadEntry: (entry) => {
      if (failure) {
        entry.resume();
        return;
      }
      try {
        materialize(entry);
      } catch (err) {
        entry.resume();
        failure = err instanceof FormatError
          ? err
          : new FormatError(`Could not extract ${entry.path}`, { cause: err });
        parser.abort(failure);
      }
    },
  });

  try {
    await pipeline(createReadStream(payloadPath), parser);
  } catch (err) {
    throw failure ?? new FormatError(
      `Archive could not be read: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  if (failure) {
    throw failure;
  }

  await Promise.all(writes);
  if (writeError) {
    throw writeError;
  }

  const entries = [...topLevel.entries()];
  if (entries.length !== 1) {
    throw new FormatError(
      `Expected exactly one top-level directory in the archive, found ${entries.length}`,
    );
  }
  const [accountId, isDirectory] = entries[0];
  if (!isDirectory) {
    throw new FormatError(`Top-level archive entry is not a directory: ${accountId}`);
  }
  return accountId;
}
