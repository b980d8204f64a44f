/**
 * Import Configuration
 *
 * Reads an optional zbackup.config.json from the working directory and
 * merges it over the defaults.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import type { ImportConfig } from './types.js';

/** Config filename looked up in the working directory */
export const CONFIG_FILE = 'zbackup.config.json';

/** AES block size; container reads must stay aligned to it */
export const CIPHER_BLOCK_SIZE = 16;

const ConfigFileSchema = z
  .object({
    chunkSize: z
      .number()
      .int()
      .positive()
      .refine((n) => n % CIPHER_BLOCK_SIZE === 0, {
        message: `chunkSize must be a multiple of ${CIPHER_BLOCK_SIZE}`,
      }),
    downloadsDir: z.string().min(1),
    recalledMessageText: z.string(),
    scratchDir: z.string().min(1),
  })
  .partial()
  .strict();

/**
 * Default configuration.
 */
export function defaultConfig(): ImportConfig {
  return {
    chunkSize: 1024 * 1024,
    downloadsDir: 'ZaloDownloads',
    recalledMessageText: '[Tin nhắn đã bị thu hồi]',
  };
}

/**
 * Resolve the path to the config file for the given directory.
 */
export function configPath(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), CONFIG_FILE);
}

/**
 * Merge a raw (already JSON-parsed) config object over the defaults.
 * Throws a ZodError when the object has unknown keys or bad values.
 */
export function parseConfig(raw: unknown): ImportConfig {
  const overrides = ConfigFileSchema.parse(raw);
  return { ...defaultConfig(), ...overrides };
}

/**
 * Load the config for the given directory, falling back to defaults
 * when no config file exists.
 */
export async function loadConfig(cwd?: string): Promise<ImportConfig> {
  const path = configPath(cwd);
  if (!existsSync(path)) {
    return defaultConfig();
  }

  const raw = await readFile(path, 'utf-8');
  return parseConfig(JSON.parse(raw));
}
