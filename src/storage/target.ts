/**
 * Target Store
 *
 * The message-history database the backup is imported into. Its schema is
 * owned elsewhere; this module only checks that it has been initialized and
 * writes records into it.
 */

import { existsSync } from 'node:fs';
import { createClient, type Client, type InStatement } from '@libsql/client';
import { StoreNotInitializedError } from '../errors.js';

export class TargetStore {
  private constructor(
    private readonly client: Client,
    readonly path: string,
  ) {}

  /**
   * Open an existing, initialized store.
   *
   * @throws StoreNotInitializedError when the file is missing or has no
   *   `version` row in its `metadata` table
   */
  static async open(path: string): Promise<TargetStore> {
    if (!existsSync(path)) {
      throw new StoreNotInitializedError(path);
    }

    const client = createClient({ url: `file:${path}`, intMode: 'bigint' });
    try {
      const rs = await client.execute("SELECT value FROM metadata WHERE key = 'version'");
      if (rs.rows.length === 0) {
        throw new StoreNotInitializedError(path);
      }
    } catch (err) {
      client.close();
      if (err instanceof StoreNotInitializedError) throw err;
      throw new StoreNotInitializedError(path, err);
    }

    return new TargetStore(client, path);
  }

  /**
   * Commit one record's statements atomically.
   *
   * Once this resolves, the record is durable: a later failure can't undo it.
   * If any statement fails, none of the record's statements are applied.
   */
  async commit(statements: InStatement[]): Promise<void> {
    if (statements.length === 0) return;
    await this.client.batch(statements, 'write');
  }

  /** Raw access for callers that need to read back (tests, reporting). */
  get db(): Client {
    return this.client;
  }

  close(): void {
    this.client.close();
  }
}
