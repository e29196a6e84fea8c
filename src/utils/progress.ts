import chalk from 'chalk';

export interface ProgressOptions {
  total: number;
  label?: string;
  showPercentage?: boolean;
  showCount?: boolean;
  barWidth?: number;
}

export class ProgressBar {
  private current = 0;
  private total: number;
  private label: string;
  private showPercentage: boolean;
  private showCount: boolean;
  private barWidth: number;
  private startTime = Date.now();
  private lastRender = 0;

  constructor(options: ProgressOptions) {
    this.total = Math.max(1, options.total);
    this.label = options.label ?? '';
    this.showPercentage = options.showPercentage ?? true;
    this.showCount = options.showCount ?? true;
    this.barWidth = options.barWidth ?? 30;
  }

  update(current: number, label?: string): void {
    this.current = Math.min(current, this.total);
    if (label !== undefined) this.label = label;
    this.render();
  }

  increment(label?: string): void {
    this.update(this.current + 1, label);
  }

  private render(): void {
    const now = Date.now();
    // Throttle redraws, but always draw the last step.
    if (now - this.lastRender < 50 && this.current < this.total) return;
    this.lastRender = now;

    const ratio = this.current / this.total;
    const filled = Math.round(ratio * this.barWidth);
    const bar = chalk.cyan('█'.repeat(filled)) + chalk.dim('░'.repeat(this.barWidth - filled));
    const parts = [bar];
    if (this.showPercentage) parts.push(`${Math.round(ratio * 100)}%`.padStart(4));
    if (this.showCount) parts.push(chalk.dim(`(${this.current}/${this.total})`));
    if (this.label) parts.push(this.label);

    process.stdout.write(`\r\x1b[K${parts.join(' ')}`);
  }

  finish(message?: string): void {
    this.update(this.total);
    const seconds = ((Date.now() - this.startTime) / 1000).toFixed(1);
    process.stdout.write(`\r\x1b[K${message ?? chalk.green(`✓ Done in ${seconds}s`)}\n`);
  }
}

export function createScanProgress(total: number): ProgressBar {
  return new ProgressBar({ total, label: 'Scanning...' });
}

export function createCleanProgress(total: number): ProgressBar {
  return new ProgressBar({ total, label: 'Moving to Trash...' });
}
