#!/usr/bin/env node

/**
 * zbackup-import CLI
 *
 * Decrypts an encrypted chat backup and imports its conversations and
 * messages into a message-history database.
 *
 * Usage:
 *   zbackup-import <container> <database> [passphrase] [-i <index>]
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { importCommand } from './commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('zbackup-import')
  .description('Decrypt a chat backup and import it into a message-history database.')
  .version(version)
  .argument('<container>', 'Path to the encrypted backup file')
  .argument('<database>', 'Path to the initialized message-history database')
  .argument('[passphrase]', 'Backup passphrase (default: $ZBACKUP_PASSPHRASE or prompt)')
  .option('-i, --index <path>', 'Contacts index database for user and group names')
  .option('-v, --verbose', 'Show line counts while importing')
  .action(importCommand);

await program.parseAsync();
