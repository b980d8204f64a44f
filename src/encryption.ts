/**
 * Container Decryption
 *
 * Key derivation: passphrase → SHA-256 → 256-bit key
 * IV: depends on the shape of the container filename
 *   - exactly one suffix   (e.g. backup.zl)       → 16 zero bytes
 *   - any other suffix count (e.g. backup.tar.zl) → "zie" + passphrase[0..13]
 * Encryption: AES-256-CBC, no padding, no authentication tag.
 *
 * A wrong passphrase is never detected here: the output is simply garbage.
 * See assertTarPayload() in format.ts for the check that catches it.
 */

import { createHash, createDecipheriv } from 'node:crypto';
import { createReadStream, createWriteStream } from 'node:fs';
import { mkdtemp, rename, rm, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { tmpdir } from 'node:os';
import { pipeline } from 'node:stream/promises';
import { CIPHER_BLOCK_SIZE } from './config.js';
import { FormatError } from './errors.js';
import { fileSuffixes } from './format.js';

const ALGORITHM = 'aes-256-cbc';
const IV_LENGTH = 16;
const IV_PREFIX = Buffer.from('zie', 'latin1');

export interface KeySchedule {
  key: Buffer;
  iv: Buffer;
}

export interface ScratchFile {
  /** Decrypted payload */
  path: string;
  /** Remove the payload and its scratch directory */
  dispose(): Promise<void>;
}

export interface DecryptOptions {
  chunkSize: number;
  /** Parent for the scratch directory (default: OS temp dir) */
  scratchDir?: string;
  /** Called with the scratch directory as soon as it exists */
  onScratchCreated?: (dir: string) => void;
}

/**
 * Derive the AES key from the raw passphrase bytes.
 */
export function deriveKey(passphrase: Buffer): Buffer {
  return createHash('sha256').update(passphrase).digest();
}

/**
 * Select the IV for a container. Only the number of filename suffixes
 * matters, not what they are.
 */
export function deriveIv(passphrase: Buffer, containerName: string): Buffer {
  const iv = Buffer.alloc(IV_LENGTH);
  if (fileSuffixes(containerName).length === 1) {
    return iv;
  }

  IV_PREFIX.copy(iv, 0);
  passphrase.subarray(0, IV_LENGTH - IV_PREFIX.length).copy(iv, IV_PREFIX.length);
  return iv;
}

export function deriveKeySchedule(passphrase: Buffer, containerPath: string): KeySchedule {
  return {
    key: deriveKey(passphrase),
    iv: deriveIv(passphrase, basename(containerPath)),
  };
}

/**
 * Stream-decrypt a container into a scratch file.
 *
 * The payload is written under a `.partial` name and renamed only after the
 * whole container went through, so an interrupted run never leaves a file
 * that looks complete. On failure the scratch directory is removed.
 */
export async function decryptContainer(
  containerPath: string,
  schedule: KeySchedule,
  options: DecryptOptions,
): Promise<ScratchFile> {
  const { size } = await stat(containerPath);
  if (size % CIPHER_BLOCK_SIZE !== 0) {
    throw new FormatError(
      `Container length ${size} is not a multiple of the ${CIPHER_BLOCK_SIZE}-byte cipher block`,
      { file: containerPath },
    );
  }

  const dir = await mkdtemp(join(options.scratchDir ?? tmpdir(), 'zbackup-'));
  options.onScratchCreated?.(dir);
  const dispose = () => rm(dir, { recursive: true, force: true });

  const partialPath = join(dir, 'payload.tar.partial');
  const payloadPath = join(dir, 'payload.tar');

  const decipher = createDecipheriv(ALGORITHM, schedule.key, schedule.iv);
  decipher.setAutoPadding(false);

  try {
    await pipeline(
      createReadStream(containerPath, { highWaterMark: options.chunkSize }),
      decipher,
      createWriteStream(partialPath),
    );
    await rename(partialPath, payloadPath);
  } catch (err) {
    await dispose();
    throw err;
  }

  return { path: payloadPath, dispose };
}
