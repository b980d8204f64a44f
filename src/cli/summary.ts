/**
 * Import Summary Display
 */

import chalk from 'chalk';
import { FormatError } from '../errors.js';
import type { ImportResult, LogImportStats } from '../types.js';

function statsLine(label: string, stats: LogImportStats): string {
  const skipped = stats.skipped > 0 ? chalk.dim(` (${stats.skipped} skipped)`) : '';
  return `  ${chalk.dim(label.padEnd(15))}${stats.committed} of ${stats.lines} lines${skipped}`;
}

/**
 * Summary lines for a finished import.
 */
export function formatImportSummary(result: ImportResult): string[] {
  return [
    `  ${chalk.dim('Account:'.padEnd(15))}${chalk.cyan(result.accountId)}`,
    `  ${chalk.dim('Extracted to:'.padEnd(15))}${result.outputDir}`,
    statsLine('Conversations:', result.conversations),
    statsLine('Messages:', result.messages),
  ];
}

export function showImportSummary(result: ImportResult): void {
  console.log();
  console.log(chalk.green.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.log(chalk.green.bold('  ✓ Import Complete'));
  console.log(chalk.green.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.log();
  for (const line of formatImportSummary(result)) {
    console.log(line);
  }
  console.log();
}

/**
 * Human-readable description of why an import failed.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof FormatError) {
    return error.describe();
  }
  return error instanceof Error ? error.message : String(error);
}

export function showImportFailure(error: unknown): void {
  console.error();
  console.error(chalk.red.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.error(chalk.red.bold('  ✗ Import Failed'));
  console.error(chalk.red.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.error();
  console.error(chalk.red(`  ${describeFailure(error)}`));
  console.error();
  console.error(chalk.dim('  Records imported before the failure are kept; re-running is safe.'));
  console.error();
}
