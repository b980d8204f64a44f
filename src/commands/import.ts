/**
 * zbackup-import <container> <database> [passphrase]: import a backup
 */

import { rm } from 'node:fs/promises';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { getPassphrase } from '../passphrase.js';
import { openNameResolver } from '../resolver.js';
import { restoreBackup } from '../restore.js';
import { TargetStore } from '../storage/target.js';
import { ProgressDisplay } from '../cli/progress.js';
import { SignalHandler } from '../cli/signal-handler.js';
import { showImportFailure, showImportSummary } from '../cli/summary.js';
import type { NameResolver } from '../types.js';

export interface ImportOptions {
  /** Contacts index for user and group names */
  index?: string;
  verbose?: boolean;
}

export async function importCommand(
  containerPath: string,
  databasePath: string,
  passphraseArg: string | undefined,
  options: ImportOptions,
): Promise<void> {
  console.log();
  console.log(chalk.bold(`📦 Importing backup: ${chalk.cyan(containerPath)}`));
  console.log();

  const scratchDirs: string[] = [];
  const signals = new SignalHandler({
    cleanup: async () => {
      await Promise.all(scratchDirs.map((dir) => rm(dir, { recursive: true, force: true })));
    },
  });
  signals.register();

  const progress = new ProgressDisplay({ verbose: options.verbose });
  let store: TargetStore | undefined;
  let resolver: NameResolver | undefined;

  try {
    const config = await loadConfig();
    const passphrase = await getPassphrase(passphraseArg);

    store = await TargetStore.open(databasePath);
    resolver = options.index ? openNameResolver(options.index, passphrase) : undefined;

    const result = await restoreBackup({
      passphrase,
      containerPath,
      store,
      resolver,
      config,
      onEvent: progress.handleEvent,
      onScratchCreated: (dir) => scratchDirs.push(dir),
    });

    showImportSummary(result);
  } catch (err) {
    progress.stop();
    showImportFailure(err);
    process.exitCode = 1;
  } finally {
    resolver?.close();
    store?.close();
    signals.unregister();
  }
}
