/**
 * Progress reporting utilities for gostrap
 * Provides spinner and progress indicators for long-running operations
 */

import type { IProgressReporter } from '../interfaces.js';
import type { DownloadProgress } from '../types.js';
import { colors } from './colors.js';

const BAR_WIDTH = 30;

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i] ?? 'B'}`;
}

/**
 * Render a download progress bar, e.g. `[███░░░] 50% (1 KB/2 KB)`
 */
export function renderProgressBar(progress: DownloadProgress, width: number = BAR_WIDTH): string {
  const ratio = Math.max(0, Math.min(1, progress.percentage / 100));
  const filled = Math.floor(ratio * width);
  const bar = '█'.repeat(filled) + '░'.repeat(width - filled);
  return `[${bar}] ${Math.floor(progress.percentage)}% (${formatBytes(progress.bytesDownloaded)}/${formatBytes(progress.totalBytes)})`;
}

export class SpinnerProgressReporter implements IProgressReporter {
  private spinnerChars = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private spinnerIndex = 0;
  private spinnerInterval: ReturnType<typeof setInterval> | null = null;
  private currentMessage = '';
  private readonly stream: NodeJS.WriteStream;

  constructor(stream: NodeJS.WriteStream = process.stderr) {
    this.stream = stream;
  }

  public startProgress(message: string): void {
    this.currentMessage = message;
    this.spinnerIndex = 0;

    this.stopSpinner();

    if (!this.stream.isTTY) {
      this.stream.write(`${message}\n`);
      return;
    }

    this.spinnerInterval = setInterval(() => {
      const frame = this.spinnerChars[this.spinnerIndex] ?? '';
      this.stream.write(`\r${colors.cyan(frame)} ${this.currentMessage}`);
      this.spinnerIndex = (this.spinnerIndex + 1) % this.spinnerChars.length;
    }, 100);
  }

  /**
   * Byte progress replaces the spinner with a bar once totals are known
   */
  public updateProgress(progress: DownloadProgress): void {
    if (!this.stream.isTTY || progress.totalBytes <= 0) {
      return;
    }
    this.stopSpinner();
    this.stream.write(`\r${colors.cyan('Downloading:')} ${renderProgressBar(progress)}`);
  }

  public finishProgress(message?: string): void {
    this.stopSpinner();
    const prefix = this.stream.isTTY ? '\r' : '';
    this.stream.write(`${prefix}${colors.green('✓')} ${message ?? this.currentMessage}\n`);
  }

  public reportError(error: Error): void {
    this.stopSpinner();
    const prefix = this.stream.isTTY ? '\r' : '';
    this.stream.write(`${prefix}${colors.red('✗')} ${this.currentMessage} - ${error.message}\n`);
  }

  private stopSpinner(): void {
    if (this.spinnerInterval) {
      clearInterval(this.spinnerInterval);
      this.spinnerInterval = null;
      this.stream.write('\r' + ' '.repeat(80) + '\r');
    }
  }
}
