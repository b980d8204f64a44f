/**
 * Progress Display
 *
 * Renders import events as ora spinners, one per phase.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { ImportEvent, ImportPhase } from '../types.js';

export interface ProgressDisplayOptions {
  /** Show per-batch line counts */
  verbose?: boolean;
}

// ─── Phase Icons & Labels ────────────────────────────────────

const PHASE_CONFIG: Record<ImportPhase, { icon: string; label: string }> = {
  decrypting: { icon: '🔓', label: 'Decrypting' },
  extracting: { icon: '📦', label: 'Extracting' },
  conversations: { icon: '💬', label: 'Conversations' },
  messages: { icon: '📥', label: 'Messages' },
};

export class ProgressDisplay {
  private spinner: Ora | null = null;
  private currentPhase: ImportPhase = 'decrypting';
  private phaseStartTime = 0;
  private verbose: boolean;

  constructor(options: ProgressDisplayOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  handleEvent = (event: ImportEvent): void => {
    switch (event.type) {
      case 'phase:start':
        if (event.phase) this.startPhase(event.phase, event.message);
        break;
      case 'phase:complete':
        if (event.phase) this.completePhase(event.phase, event.message);
        break;
      case 'progress':
        this.updateProgress(event.message);
        if (this.verbose && event.lines !== undefined) {
          this.log(chalk.dim(`  ⟳ ${event.lines} lines`));
        }
        break;
      case 'error':
        this.failPhase(event.error?.message ?? 'Unknown error');
        break;
      case 'complete':
        this.stop();
        break;
    }
  };

  startPhase(phase: ImportPhase, message?: string): void {
    this.spinner?.stop();

    this.currentPhase = phase;
    this.phaseStartTime = Date.now();

    const config = PHASE_CONFIG[phase];
    this.spinner = ora({
      text: `${config.icon} ${message ?? `${config.label}...`}`,
      color: 'cyan',
    }).start();
  }

  completePhase(phase: ImportPhase, message?: string): void {
    const elapsed = formatElapsed(Date.now() - this.phaseStartTime);
    const config = PHASE_CONFIG[phase];

    if (this.spinner) {
      this.spinner.succeed(`${config.icon} ${message ?? config.label} ${chalk.dim(`(${elapsed})`)}`);
      this.spinner = null;
    }
  }

  failPhase(errorMessage: string): void {
    const config = PHASE_CONFIG[this.currentPhase];
    if (this.spinner) {
      this.spinner.fail(`${config.label} failed: ${errorMessage}`);
      this.spinner = null;
    }
  }

  updateProgress(message?: string): void {
    if (!this.spinner) return;
    const config = PHASE_CONFIG[this.currentPhase];
    this.spinner.text = `${config.icon} ${message ?? config.label}`;
  }

  /**
   * Log a message (preserving spinner)
   */
  log(message: string): void {
    if (this.spinner) {
      this.spinner.stop();
      console.log(message);
      this.spinner.start();
    } else {
      console.log(message);
    }
  }

  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }
}

export function formatElapsed(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
