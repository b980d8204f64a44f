/**
 * Newline-delimited JSON log reading.
 *
 * Logs are read one line at a time and each line's records are committed
 * before the next line is read, so an interrupted import leaves every
 * earlier line in the store and can simply be re-run.
 */

import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import type { InStatement } from '@libsql/client';
import { FormatError, withRecordContext } from '../errors.js';
import type { TargetStore } from '../storage/target.js';
import type { LogImportStats } from '../types.js';

export interface LogLine {
  /** 1-based line number */
  line: number;
  value: unknown;
}

/**
 * What to commit for one line. `followUp` is only built once `statements`
 * are committed, so a failure there leaves them in the store.
 */
export interface RecordWrite {
  statements: InStatement[];
  followUp?: () => Promise<InStatement[]>;
}

/**
 * Turns one parsed line into its writes, or `null` when the line is
 * acknowledged without writing anything.
 */
export type RecordBuilder = (value: unknown) => Promise<RecordWrite | null>;

/** How often (in lines) progress is reported */
const PROGRESS_INTERVAL = 1000;

/**
 * Yield the parsed JSON value of every non-blank line.
 */
export async function* readLog(path: string): AsyncGenerator<LogLine> {
  const input = createReadStream(path, { encoding: 'utf-8' });
  const rl = createInterface({ input, crlfDelay: Infinity });

  let line = 0;
  try {
    for await (const text of rl) {
      line++;
      if (text.trim() === '') continue;

      let value: unknown;
      try {
        value = JSON.parse(text);
      } catch (err) {
        throw new FormatError('Malformed JSON line', { file: path, line, cause: err });
      }
      yield { line, value };
    }
  } finally {
    rl.close();
    input.destroy();
  }
}

/**
 * Import every line of a log, committing each line on its own.
 */
export async function importLog(
  path: string,
  store: TargetStore,
  build: RecordBuilder,
  onProgress?: (lines: number) => void,
): Promise<LogImportStats> {
  const stats: LogImportStats = { lines: 0, committed: 0, skipped: 0 };

  for await (const { line, value } of readLog(path)) {
    stats.lines++;
    try {
      const record = await build(value);
      if (record === null) {
        stats.skipped++;
      } else {
        await store.commit(record.statements);
        if (record.followUp) {
          await store.commit(await record.followUp());
        }
        stats.committed++;
      }
    } catch (err) {
      throw withRecordContext(err, { file: path, line });
    }

    if (onProgress && stats.lines % PROGRESS_INTERVAL === 0) {
      onProgress(stats.lines);
    }
  }

  return stats;
}
