/**
 * Shared test fixtures: target databases, tar payloads, encrypted containers.
 */

import { createCipheriv } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';
import { createClient } from '@libsql/client';
import { Header } from 'tar';
import { defaultConfig } from '../config.js';
import { NullNameResolver } from '../resolver.js';
import { TargetStore } from '../storage/target.js';
import type { ImportContext, NameResolver } from '../types.js';

const SCHEMA_URL = new URL('./fixtures/target-schema.sql', import.meta.url);

/**
 * Create a target database at `path` from the schema fixture.
 */
export async function createTargetDb(path: string, options: { initialized?: boolean } = {}): Promise<void> {
  const client = createClient({ url: `file:${path}` });
  try {
    await client.executeMultiple(await readFile(SCHEMA_URL, 'utf-8'));
    if (options.initialized === false) {
      await client.execute('DELETE FROM metadata');
    }
  } finally {
    client.close();
  }
}

export async function openTestStore(path: string): Promise<TargetStore> {
  await createTargetDb(path);
  return TargetStore.open(path);
}

/**
 * All rows of a query as plain objects.
 */
export async function queryRows(store: TargetStore, sql: string): Promise<Record<string, unknown>[]> {
  const rs = await store.db.execute(sql);
  return rs.rows.map((row) => Object.fromEntries(rs.columns.map((column) => [column, row[column]])));
}

/**
 * Every table's contents, for comparing whole-store state.
 */
export async function dumpStore(store: TargetStore): Promise<Record<string, Record<string, unknown>[]>> {
  const tables: Record<string, string> = {
    servers: 'SELECT * FROM servers ORDER BY id',
    channels: 'SELECT * FROM channels ORDER BY id',
    users: 'SELECT * FROM users ORDER BY id',
    messages: 'SELECT * FROM messages ORDER BY message_id',
    attachments: 'SELECT * FROM attachments ORDER BY attachment_id',
    message_attachments: 'SELECT * FROM message_attachments ORDER BY message_id',
    message_replied_to: 'SELECT * FROM message_replied_to ORDER BY message_id',
    download_metadata: 'SELECT * FROM download_metadata ORDER BY normalized_url',
    download_blobs: 'SELECT normalized_url, length(blob) AS size FROM download_blobs ORDER BY normalized_url',
  };
  const dump: Record<string, Record<string, unknown>[]> = {};
  for (const [table, sql] of Object.entries(tables)) {
    dump[table] = await queryRows(store, sql);
  }
  return dump;
}

export function testContext(overrides: Partial<ImportContext> = {}): ImportContext {
  return {
    accountId: '12345',
    outputDir: '/nonexistent',
    config: defaultConfig(),
    resolver: new NullNameResolver(),
    ...overrides,
  };
}

/**
 * Resolver answering from fixed tables.
 */
export function fakeResolver(names: { user?: Record<string, string>; group?: Record<string, string> }): NameResolver {
  return {
    lookup: async (id, kind) => names[kind]?.[String(id)],
    close: () => {},
  };
}

export async function writeLog(path: string, entries: unknown[]): Promise<void> {
  await writeFile(path, entries.map((entry) => JSON.stringify(entry)).join('\n') + '\n', 'utf-8');
}

// ─── Archives ────────────────────────────────────────────────

export interface TarEntry {
  path: string;
  type?: 'File' | 'Directory' | 'SymbolicLink';
  data?: Buffer | string;
  linkpath?: string;
}

/**
 * Build a raw tar archive from in-memory entries.
 */
export function buildTar(entries: TarEntry[]): Buffer {
  const blocks: Buffer[] = [];

  for (const entry of entries) {
    const data = entry.data === undefined ? Buffer.alloc(0) : Buffer.from(entry.data);
    const headerBuf = Buffer.alloc(512);
    const h = new Header();
    h.path = entry.path;
    h.size = data.length;
    h.type = entry.type ?? 'File';
    h.mode = entry.type === 'Directory' ? 0o755 : 0o644;
    h.mtime = new Date(0);
    h.uid = 0;
    h.gid = 0;
    if (entry.linkpath) h.linkpath = entry.linkpath;
    h.encode(headerBuf, 0);

    blocks.push(headerBuf);
    blocks.push(data);

    // Pad data to 512-byte boundary
    const remainder = data.length % 512;
    if (remainder > 0) {
      blocks.push(Buffer.alloc(512 - remainder));
    }
  }

  // End-of-archive marker: two 512-byte zero blocks
  blocks.push(Buffer.alloc(1024));

  return Buffer.concat(blocks);
}

/**
 * Encrypt a payload the way the chat application does. The payload length
 * must already be a multiple of 16 (tar archives always are).
 */
export function encryptContainer(payload: Buffer, key: Buffer, iv: Buffer): Buffer {
  const cipher = createCipheriv('aes-256-cbc', key, iv);
  cipher.setAutoPadding(false);
  return Buffer.concat([cipher.update(payload), cipher.final()]);
}
