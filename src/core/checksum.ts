/**
 * Checksum lookup and verification for downloaded release archives
 */

import type { IChecksumVerifier, IDownloader, ILogger } from '../interfaces.js';
import type { ArtifactDescriptor } from '../types.js';
import { calculateSha256, checksumsMatch, extractChecksumAfter, isSha256Hex } from '../utils/crypto.js';
import { InstallerError } from './errors.js';
import { findArtifactChecksum, parseReleaseManifest } from './manifest.js';

export interface ChecksumSources {
  releaseIndexUrl: string;
  manifestUrl: string;
  structuredManifest: boolean;
  /** Lines after the filename searched on the index page */
  checksumWindow: number;
}

export class ChecksumVerifier implements IChecksumVerifier {
  constructor(
    private downloader: IDownloader,
    private sources: ChecksumSources,
    private logger: ILogger
  ) {}

  /**
   * Published SHA-256 for the artifact, always fetched fresh
   * @throws InstallerError ChecksumFetchError
   */
  public async fetchExpected(artifact: ArtifactDescriptor): Promise<string> {
    if (this.sources.structuredManifest) {
      const fromManifest = await this.checksumFromManifest(artifact.filename);
      if (fromManifest) {
        return fromManifest;
      }
      this.logger.warn(`No checksum for ${artifact.filename} in the release manifest, reading the release index page instead`);
    }
    return this.checksumFromIndex(artifact.filename);
  }

  /**
   * @throws InstallerError ChecksumMismatch when the file digest differs from the expected one
   */
  public async verify(artifact: ArtifactDescriptor, filePath: string): Promise<void> {
    const expected = artifact.expectedChecksum ?? await this.fetchExpected(artifact);

    let actual: string;
    try {
      actual = await calculateSha256(filePath);
    } catch (error) {
      throw new InstallerError('ChecksumMismatch', `Could not hash ${filePath}`, error);
    }

    this.logger.debug(`sha256 ${artifact.filename}: expected ${expected}, got ${actual}`);
    if (!checksumsMatch(actual, expected)) {
      throw new InstallerError(
        'ChecksumMismatch',
        `Checksum mismatch for ${artifact.filename}: expected ${expected.toLowerCase()}, got ${actual}`
      );
    }
  }

  private async checksumFromManifest(filename: string): Promise<string | null> {
    try {
      const manifest = parseReleaseManifest(await this.downloader.fetchText(this.sources.manifestUrl));
      const checksum = findArtifactChecksum(manifest, filename);
      return checksum && isSha256Hex(checksum) ? checksum.toLowerCase() : null;
    } catch (error) {
      this.logger.debug(`Release manifest unavailable: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  private async checksumFromIndex(filename: string): Promise<string> {
    let page: string;
    try {
      page = await this.downloader.fetchText(this.sources.releaseIndexUrl);
    } catch (error) {
      throw new InstallerError('ChecksumFetchError', `Failed to fetch checksum source ${this.sources.releaseIndexUrl}`, error);
    }

    const checksum = extractChecksumAfter(page, filename, this.sources.checksumWindow);
    if (!checksum) {
      throw new InstallerError('ChecksumFetchError', `No SHA-256 checksum found for ${filename}`);
    }
    return checksum;
  }
}
