import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { defaultConfig } from '../config.js';
import { deriveKeySchedule } from '../encryption.js';
import { FormatError } from '../errors.js';
import { restoreBackup } from '../restore.js';
import type { TargetStore } from '../storage/target.js';
import type { ImportConfig, ImportEvent } from '../types.js';
import { buildTar, dumpStore, encryptContainer, openTestStore, queryRows, type TarEntry } from './helpers.js';

const CONVERSATIONS = '{"userId":"g999"}\n';
const MESSAGES =
  '{"cliMsgId":1,"fromUid":"7","toUid":"g999","dName":"","msgType":1,"message":"hi","serverTime":1000,"quote":null}\n';

function backupEntries(conversations = CONVERSATIONS, messages = MESSAGES): TarEntry[] {
  return [
    { path: '12345/', type: 'Directory' },
    { path: '12345/ZaloDownloads/', type: 'Directory' },
    { path: '12345/ZaloDownloads/database/', type: 'Directory' },
    { path: '12345/ZaloDownloads/database/12345_zconversation.zdb', data: conversations },
    { path: '12345/ZaloDownloads/database/12345_zmessage.zdb', data: messages },
  ];
}

describe('restoreBackup', () => {
  let workDir: string;
  let scratchDir: string;
  let store: TargetStore;
  let config: ImportConfig;

  async function writeContainer(name: string, passphrase: string, entries: TarEntry[]): Promise<string> {
    const path = join(workDir, name);
    const schedule = deriveKeySchedule(Buffer.from(passphrase), path);
    await writeFile(path, encryptContainer(buildTar(entries), schedule.key, schedule.iv));
    return path;
  }

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'zbackup-restore-test-'));
    scratchDir = join(workDir, 'scratch');
    await mkdir(scratchDir);
    store = await openTestStore(join(workDir, 'target.db'));
    config = { ...defaultConfig(), chunkSize: 64, scratchDir };
  });

  afterEach(async () => {
    store.close();
    await rm(workDir, { recursive: true, force: true });
  });

  it('decrypts, extracts and imports a single-suffix backup', async () => {
    const containerPath = await writeContainer('backup.zaloenc', 'p', backupEntries());

    const result = await restoreBackup({ passphrase: Buffer.from('p'), containerPath, store, config });

    expect(result).toEqual({
      accountId: '12345',
      outputDir: join(workDir, 'backup'),
      conversations: { lines: 1, committed: 1, skipped: 0 },
      messages: { lines: 1, committed: 1, skipped: 0 },
    });
    expect(await queryRows(store, 'SELECT * FROM servers')).toEqual([
      { id: 999n, name: 'Group #999', type: 'GROUP' },
    ]);
    expect(await queryRows(store, 'SELECT id, server, name FROM channels')).toEqual([
      { id: 999n, server: 999n, name: 'Group #999' },
    ]);
    expect(await queryRows(store, 'SELECT id, name FROM users')).toEqual([{ id: 7n, name: 'User #7' }]);
    expect(await queryRows(store, 'SELECT * FROM messages')).toEqual([
      { message_id: 1n, sender_id: 7n, channel_id: 999n, text: 'hi', timestamp: 1000n },
    ]);
  });

  it('handles the derived-IV format of multi-suffix backups', async () => {
    const containerPath = await writeContainer('backup.tar.zaloenc', 'longer passphrase', backupEntries());

    const result = await restoreBackup({ passphrase: Buffer.from('longer passphrase'), containerPath, store, config });

    expect(result.outputDir).toBe(join(workDir, 'backup'));
    expect(await queryRows(store, 'SELECT text FROM messages')).toEqual([{ text: 'hi' }]);
  });

  it('leaves no scratch files behind', async () => {
    const containerPath = await writeContainer('backup.zaloenc', 'p', backupEntries());
    await restoreBackup({ passphrase: Buffer.from('p'), containerPath, store, config });
    expect(await readdir(scratchDir)).toEqual([]);
  });

  it('gives the same store and files when run twice', async () => {
    const containerPath = await writeContainer('backup.zaloenc', 'p', backupEntries());

    await restoreBackup({ passphrase: Buffer.from('p'), containerPath, store, config });
    const firstDump = await dumpStore(store);
    const logPath = join(workDir, 'backup/12345/ZaloDownloads/database/12345_zmessage.zdb');
    const firstLog = await readFile(logPath);

    await restoreBackup({ passphrase: Buffer.from('p'), containerPath, store, config });

    expect(await dumpStore(store)).toEqual(firstDump);
    expect(await readFile(logPath)).toEqual(firstLog);
  });

  it('reports a wrong passphrase as a format error before extracting', async () => {
    const containerPath = await writeContainer('backup.zaloenc', 'p', backupEntries());

    const attempt = restoreBackup({ passphrase: Buffer.from('q'), containerPath, store, config });

    await expect(attempt).rejects.toBeInstanceOf(FormatError);
    await expect(attempt).rejects.toThrow('wrong passphrase');
    expect(await readdir(workDir)).not.toContain('backup');
    expect(await readdir(scratchDir)).toEqual([]);
  });

  it('fails when a log is missing', async () => {
    const entries = backupEntries().filter((entry) => !entry.path.endsWith('_zmessage.zdb'));
    const containerPath = await writeContainer('backup.zaloenc', 'p', entries);

    await expect(
      restoreBackup({ passphrase: Buffer.from('p'), containerPath, store, config }),
    ).rejects.toMatchObject({
      message: 'Backup is missing a log file',
      file: join(workDir, 'backup/12345/ZaloDownloads/database/12345_zmessage.zdb'),
    });
  });

  it('emits phase events in order', async () => {
    const containerPath = await writeContainer('backup.zaloenc', 'p', backupEntries());
    const events: ImportEvent[] = [];

    await restoreBackup({
      passphrase: Buffer.from('p'),
      containerPath,
      store,
      config,
      onEvent: (event) => events.push(event),
    });

    expect(events.map((event) => `${event.type}:${event.phase ?? ''}`)).toEqual([
      'phase:start:decrypting',
      'phase:complete:decrypting',
      'phase:start:extracting',
      'phase:complete:extracting',
      'phase:start:conversations',
      'phase:complete:conversations',
      'phase:start:messages',
      'phase:complete:messages',
      'complete:',
    ]);
  });

  it('emits an error event with the failing phase', async () => {
    const containerPath = await writeContainer(
      'backup.zaloenc',
      'p',
      backupEntries(CONVERSATIONS, '{"cliMsgId":\n'),
    );
    const events: ImportEvent[] = [];

    await expect(
      restoreBackup({
        passphrase: Buffer.from('p'),
        containerPath,
        store,
        config,
        onEvent: (event) => events.push(event),
      }),
    ).rejects.toBeInstanceOf(FormatError);

    const last = events[events.length - 1];
    expect(last.type).toBe('error');
    expect(last.phase).toBe('messages');
    expect(await queryRows(store, 'SELECT id FROM servers')).toEqual([{ id: 999n }]);
  });
});
