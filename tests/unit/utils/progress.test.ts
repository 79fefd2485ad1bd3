import { describe, it, expect } from 'vitest';
import { formatBytes, renderProgressBar } from '../../../src/utils/progress.js';

describe('formatBytes', () => {
  it('should scale to the largest whole unit', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(70 * 1024 * 1024)).toBe('70 MB');
  });

  it('should stop at gigabytes', () => {
    expect(formatBytes(2 * 1024 ** 4)).toBe('2048 GB');
  });
});

describe('renderProgressBar', () => {
  it('should fill the bar in proportion', () => {
    expect(renderProgressBar({ bytesDownloaded: 1024, totalBytes: 2048, percentage: 50 }, 10)).toBe(
      '[█████░░░░░] 50% (1 KB/2 KB)'
    );
  });

  it('should clamp out of range percentages', () => {
    expect(renderProgressBar({ bytesDownloaded: 0, totalBytes: 0, percentage: 150 }, 4)).toBe('[████] 150% (0 B/0 B)');
  });
});
