/**
 * Live progress for the lookup loop.
 * Uses a cli-progress bar on an interactive terminal, one plain line per
 * request everywhere else.
 */

import cliProgress from 'cli-progress';
import chalk from 'chalk';
import type { CollectionProgress, ResponseAnomaly } from '../types.js';

const LABEL = chalk.bold.cyan('Checking');

export class ProgressUI {
  private bar: cliProgress.SingleBar | null = null;
  private readonly isInteractive: boolean;

  constructor(private quiet: boolean = false) {
    this.isInteractive = Boolean(process.stdout.isTTY) && !quiet && !process.env.NO_COLOR && !process.env.CI;
  }

  start(total: number): void {
    if (!this.isInteractive) return;

    this.bar = new cliProgress.SingleBar({
      format: '{label} |{bar}| {value}/{total} | HTTP Status: {status}',
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true
    }, cliProgress.Presets.shades_classic);
    this.bar.start(total, 0, { label: LABEL, status: '-' });
  }

  update(progress: CollectionProgress): void {
    const status = progress.status === null ? 'no response' : String(progress.status);

    if (this.bar) {
      this.bar.update(progress.index, { status });
    } else if (!this.quiet) {
      console.log(`[+] Checking ${progress.index} out of ${progress.total}    |    HTTP Status: ${status}`);
    }
  }

  /**
   * Unexpected statuses are shown even though they don't stop the run.
   */
  anomaly(anomaly: ResponseAnomaly): void {
    if (this.quiet) return;
    const detail = anomaly.error ? ` (${anomaly.error})` : '';
    const message = `Unexpected response for ${anomaly.address}: ${anomaly.status ?? 'no response'}${detail}`;
    if (this.bar) {
      // cli-progress redraws over console output, so log above the bar
      this.bar.stop();
      console.warn(chalk.yellow('⚠ ') + message);
      this.bar.start(this.bar.getTotal(), anomaly.index, { label: LABEL, status: String(anomaly.status ?? 'no response') });
    } else {
      console.warn(`Warning: ${message}`);
    }
  }

  stop(): void {
    if (this.bar) {
      this.bar.stop();
      this.bar = null;
    }
  }
}
