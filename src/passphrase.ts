/**
 * Passphrase Handling
 *
 * The passphrase is whatever the chat application used for the export:
 * no length rules apply, and it is used as raw UTF-8 bytes.
 * - Explicit argument
 * - ZBACKUP_PASSPHRASE env var (for non-interactive use)
 * - Interactive TTY prompt with hidden input
 */

import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';

export const PASSPHRASE_ENV = 'ZBACKUP_PASSPHRASE';

/**
 * Get the passphrase bytes.
 *
 * Priority:
 * 1. `explicit` (the CLI argument)
 * 2. ZBACKUP_PASSPHRASE environment variable
 * 3. Interactive TTY prompt with hidden input
 */
export async function getPassphrase(explicit?: string): Promise<Buffer> {
  if (explicit) {
    return Buffer.from(explicit, 'utf-8');
  }

  const envPassphrase = process.env[PASSPHRASE_ENV];
  if (envPassphrase) {
    return Buffer.from(envPassphrase, 'utf-8');
  }

  if (!process.stdin.isTTY) {
    throw new Error(
      `No passphrase available. Pass it as an argument, set ${PASSPHRASE_ENV}, ` +
      'or run in an interactive terminal.',
    );
  }

  const passphrase = await promptHidden('🔑 Backup passphrase: ');
  if (!passphrase) {
    throw new Error('Passphrase must not be empty.');
  }
  return Buffer.from(passphrase, 'utf-8');
}

/**
 * Prompt for input with hidden characters (no echo).
 */
function promptHidden(prompt: string): Promise<string> {
  return new Promise((resolve, reject) => {
    process.stderr.write(prompt);

    const muted = new Writable({
      write(_chunk: Buffer, _encoding: BufferEncoding, callback: () => void) {
        callback();
      },
    });

    const rl = createInterface({
      input: process.stdin,
      output: muted,
      terminal: true,
    });

    rl.question('', (answer) => {
      rl.close();
      process.stderr.write('\n');
      resolve(answer);
    });

    rl.on('error', (err: Error) => {
      rl.close();
      reject(err);
    });
  });
}
