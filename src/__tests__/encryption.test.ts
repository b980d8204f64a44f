import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { createHash } from 'node:crypto';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { decryptContainer, deriveIv, deriveKey, deriveKeySchedule } from '../encryption.js';
import { FormatError } from '../errors.js';
import { encryptContainer } from './helpers.js';

describe('key schedule', () => {
  it('derives the key as SHA-256 of the passphrase bytes', () => {
    const expected = createHash('sha256').update('p').digest();
    expect(deriveKey(Buffer.from('p'))).toEqual(expected);
    expect(deriveKey(Buffer.from('p'))).toHaveLength(32);
  });

  it('uses a zero IV for a single-suffix filename', () => {
    expect(deriveIv(Buffer.from('secret-passphrase'), 'backup.zaloenc')).toEqual(Buffer.alloc(16));
  });

  it('derives the IV from the passphrase for a multi-suffix filename', () => {
    const iv = deriveIv(Buffer.from('passphrase-longer-than-13'), 'backup.tar.zaloenc');
    expect(iv.toString('latin1')).toBe('ziepassphrase-lo');
  });

  it('zero-pads the derived IV for short passphrases', () => {
    const iv = deriveIv(Buffer.from('p'), 'backup.2024.zl');
    expect(iv).toEqual(Buffer.concat([Buffer.from('ziep', 'latin1'), Buffer.alloc(12)]));
  });

  it('derives the IV from the passphrase when the filename has no suffix', () => {
    const iv = deriveIv(Buffer.from('abc'), 'backup');
    expect(iv.subarray(0, 6).toString('latin1')).toBe('zieabc');
  });

  it('looks only at the file name, not the directories', () => {
    const schedule = deriveKeySchedule(Buffer.from('p'), '/data/exports.v2/backup.zaloenc');
    expect(schedule.iv).toEqual(Buffer.alloc(16));
  });
});

describe('decryptContainer', () => {
  let workDir: string;
  let scratchDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'zbackup-enc-test-'));
    scratchDir = join(workDir, 'scratch');
    await mkdir(scratchDir);
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('streams the container through AES-256-CBC', async () => {
    const plaintext = Buffer.alloc(4096);
    for (let i = 0; i < plaintext.length; i++) plaintext[i] = i % 251;

    const schedule = deriveKeySchedule(Buffer.from('p'), 'backup.zaloenc');
    const containerPath = join(workDir, 'backup.zaloenc');
    await writeFile(containerPath, encryptContainer(plaintext, schedule.key, schedule.iv));

    const scratch = await decryptContainer(containerPath, schedule, { chunkSize: 48, scratchDir });
    expect(await readFile(scratch.path)).toEqual(plaintext);
    expect(await readdir(dirname(scratch.path))).toEqual(['payload.tar']);

    await scratch.dispose();
    expect(existsSync(dirname(scratch.path))).toBe(false);
  });

  it('rejects a container whose length is not a multiple of the block size', async () => {
    const containerPath = join(workDir, 'broken.zaloenc');
    await writeFile(containerPath, Buffer.alloc(17));
    const schedule = deriveKeySchedule(Buffer.from('p'), containerPath);

    const attempt = decryptContainer(containerPath, schedule, { chunkSize: 1024, scratchDir });
    await expect(attempt).rejects.toBeInstanceOf(FormatError);
    await expect(attempt).rejects.toThrow('Container length 17 is not a multiple of the 16-byte cipher block');
    expect(await readdir(scratchDir)).toEqual([]);
  });

  it('reports the scratch directory before decrypting', async () => {
    const schedule = deriveKeySchedule(Buffer.from('p'), 'backup.zaloenc');
    const containerPath = join(workDir, 'backup.zaloenc');
    await writeFile(containerPath, encryptContainer(Buffer.alloc(32), schedule.key, schedule.iv));

    const seen: string[] = [];
    const scratch = await decryptContainer(containerPath, schedule, {
      chunkSize: 1024,
      scratchDir,
      onScratchCreated: (dir) => seen.push(dir),
    });

    expect(seen).toEqual([dirname(scratch.path)]);
    await scratch.dispose();
  });
});
