/**
 * Signal Handler
 *
 * Ctrl+C (SIGINT) and SIGTERM handling for the import command. Records
 * already committed stay in the store; the handler only removes the
 * decryption scratch directory before exiting.
 */

import chalk from 'chalk';

export interface SignalHandlerOptions {
  /** Cleanup to run before exiting */
  cleanup?: () => Promise<void>;
  /** Message to show on interrupt */
  message?: string;
}

export class SignalHandler {
  private cleanup?: () => Promise<void>;
  private message: string;
  private isHandling = false;
  private interruptCount = 0;

  constructor(options: SignalHandlerOptions = {}) {
    this.cleanup = options.cleanup;
    this.message = options.message ?? 'Import interrupted.';
  }

  register(): void {
    process.on('SIGINT', this.handleInterrupt);
    process.on('SIGTERM', this.handleInterrupt);
  }

  unregister(): void {
    process.off('SIGINT', this.handleInterrupt);
    process.off('SIGTERM', this.handleInterrupt);
  }

  private handleInterrupt = async (): Promise<void> => {
    this.interruptCount++;

    // Force exit on second interrupt
    if (this.interruptCount > 1) {
      console.log();
      console.log(chalk.red('Force quit.'));
      process.exit(1);
    }

    if (this.isHandling) {
      return;
    }
    this.isHandling = true;

    console.log();
    console.log();
    console.log(chalk.yellow.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
    console.log(chalk.yellow.bold('  ⏸ Import Interrupted'));
    console.log(chalk.yellow.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
    console.log();
    console.log(chalk.yellow(`  ${this.message}`));
    console.log(chalk.dim('  Records imported so far are kept. Re-run the same command to resume.'));
    console.log();

    if (this.cleanup) {
      try {
        console.log(chalk.dim('  Cleaning up...'));
        await this.cleanup();
      } catch (error) {
        console.log(chalk.red(`  Cleanup error: ${error instanceof Error ? error.message : String(error)}`));
      }
    }

    process.exit(130); // 128 + SIGINT(2)
  };
}
