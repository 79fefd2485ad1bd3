/**
 * HTTP transport built on the global fetch
 */

import { basename } from 'path';
import type { IDownloader, IFileSystemManager, IProgressReporter } from '../interfaces.js';

export class HttpDownloader implements IDownloader {
  constructor(
    private fileSystemManager: IFileSystemManager,
    private progressReporter?: IProgressReporter
  ) {}

  async fetchText(url: string): Promise<string> {
    const response = await fetch(url);
    if (!response.ok) {
      throw new Error(`HTTP error! status: ${response.status} (${url})`);
    }
    return response.text();
  }

  /**
   * Download a file from a URL with progress display
   */
  async downloadFile(url: string, destination: string): Promise<void> {
    const response = await fetch(url);
    if (!response.ok) {
      throw new Error(`HTTP error! status: ${response.status} (${url})`);
    }

    const reader = response.body?.getReader();
    if (!reader) {
      throw new Error('Failed to get response stream');
    }

    const filename = basename(destination);
    const contentLength = parseInt(response.headers.get('content-length') || '0', 10) || 0;
    const writer = this.fileSystemManager.createWriteStream(destination);
    const finished = new Promise<void>((resolve, reject) => {
      writer.on('finish', () => resolve());
      writer.on('error', reject);
    });
    // Awaited once the body is read; a writer error before then must not count as unhandled
    finished.catch(() => undefined);

    this.progressReporter?.startProgress(`Downloading ${filename}...`);

    let downloadedBytes = 0;
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        writer.write(value);
        downloadedBytes += value.length;

        if (contentLength > 0) {
          this.progressReporter?.updateProgress({
            filename,
            bytesDownloaded: downloadedBytes,
            totalBytes: contentLength,
            percentage: (downloadedBytes / contentLength) * 100,
          });
        }
      }
      writer.end();
      await finished;
    } catch (error) {
      writer.end();
      const failure = error instanceof Error ? error : new Error(String(error));
      this.progressReporter?.reportError(failure);
      throw failure;
    }

    this.progressReporter?.finishProgress(`Downloaded ${filename}`);
  }
}
