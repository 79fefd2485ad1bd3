/**
 * Cryptographic utilities for checksum verification
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { SHA256_HEX_LENGTH } from '../constants.js';

const SHA256_TOKEN = new RegExp(`[0-9a-f]{${SHA256_HEX_LENGTH}}`);
const SHA256_EXACT = new RegExp(`^[0-9a-fA-F]{${SHA256_HEX_LENGTH}}$`);

/**
 * Calculate SHA256 checksum of a file, streaming it so large archives stay out of memory
 */
export function calculateSha256(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    const stream = createReadStream(filePath);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

export function isSha256Hex(value: string): boolean {
  return SHA256_EXACT.test(value);
}

/**
 * Compare two hex digests, ignoring case
 */
export function checksumsMatch(actual: string, expected: string): boolean {
  return actual.trim().toLowerCase() === expected.trim().toLowerCase();
}

/**
 * Find the digest published near a filename in loosely structured text.
 *
 * For each line mentioning the filename, that line and the `window` lines after
 * it are searched for a lowercase 64-hex token; the first one found wins.
 */
export function extractChecksumAfter(text: string, filename: string, window: number): string | null {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    if (!lines[i]?.includes(filename)) {
      continue;
    }
    const last = Math.min(lines.length - 1, i + window);
    for (let j = i; j <= last; j++) {
      const match = SHA256_TOKEN.exec(lines[j] ?? '');
      if (match) {
        return match[0];
      }
    }
  }
  return null;
}
