/**
 * Name Resolution
 *
 * Display names for users and groups come from an optional contacts index
 * exported alongside the backup. Without one, every lookup misses and the
 * importers fall back to placeholder names.
 */

import { createClient, type Client } from '@libsql/client';
import type { LookupKind, NameResolver } from './types.js';

/**
 * Resolver used when no contacts index is available.
 */
export class NullNameResolver implements NameResolver {
  async lookup(_id: bigint, _kind: LookupKind): Promise<string | undefined> {
    return undefined;
  }

  close(): void {}
}

/**
 * Resolver backed by the contacts index database.
 *
 * Groups live in `group`; users are looked up in `friend` first, then in
 * `friends_info`. Empty names count as misses.
 */
export class IndexNameResolver implements NameResolver {
  private readonly cache = new Map<string, string | undefined>();

  constructor(private readonly client: Client) {}

  async lookup(id: bigint, kind: LookupKind): Promise<string | undefined> {
    const cacheKey = `${kind}:${id}`;
    if (this.cache.has(cacheKey)) {
      return this.cache.get(cacheKey);
    }

    const rs = kind === 'group'
      ? await this.client.execute({
          sql:
            'SELECT displayName FROM "group" WHERE userId IN (?, ?) ' +
            "AND displayName IS NOT NULL AND displayName != '' LIMIT 1",
          args: [`g${id}`, `${id}`],
        })
      : await this.client.execute({
          sql:
            "SELECT displayName FROM friend WHERE userId = ? AND displayName IS NOT NULL AND displayName != '' " +
            'UNION ALL ' +
            "SELECT displayName FROM friends_info WHERE userId = ? AND displayName IS NOT NULL AND displayName != '' " +
            'LIMIT 1',
          args: [`${id}`, `${id}`],
        });

    const value = rs.rows[0]?.displayName;
    const name = typeof value === 'string' ? value : undefined;
    this.cache.set(cacheKey, name);
    return name;
  }

  close(): void {
    this.client.close();
  }
}

/**
 * Open the contacts index at `path`. The index is encrypted with the backup
 * passphrase under libSQL's own key derivation; pass no passphrase for an
 * index that was exported unencrypted.
 */
export function openNameResolver(path: string, passphrase?: Buffer): NameResolver {
  const client = createClient({
    url: `file:${path}`,
    encryptionKey: passphrase ? passphrase.toString('utf-8') : undefined,
  });
  return new IndexNameResolver(client);
}
