/**
 * Version Resolution Module
 *
 * This module handles all version-related operations including:
 * - Discovering the latest stable release for the current platform
 * - Applying the user's answer to the version prompt
 * - Version validation and comparison
 */

import type { IDownloader, ILogger } from '../interfaces.js';
import type { ReleaseVersion } from '../types.js';
import { ARCHIVE_EXTENSION, VERSION_PATTERN } from '../constants.js';
import { InstallerError } from './errors.js';
import { parseReleaseManifest, stableVersionsFor } from './manifest.js';

export interface VersionSources {
  releaseIndexUrl: string;
  manifestUrl: string;
  structuredManifest: boolean;
}

export function isReleaseVersion(version: string): version is ReleaseVersion {
  return VERSION_PATTERN.test(version);
}

/**
 * Compares two version strings segment by segment
 * @returns number Negative if a < b, positive if a > b, 0 if equal
 */
export function compareVersions(a: string, b: string): number {
  const parseVersion = (version: string): number[] => {
    return version.split('.').map(part => {
      const num = parseInt(part, 10);
      return isNaN(num) ? 0 : num;
    });
  };

  const aParts = parseVersion(a);
  const bParts = parseVersion(b);
  const maxLength = Math.max(aParts.length, bParts.length);

  for (let i = 0; i < maxLength; i++) {
    const aPart = aParts[i] || 0;
    const bPart = bParts[i] || 0;

    if (aPart !== bPart) {
      return aPart - bPart;
    }
  }

  return 0;
}

/**
 * Newest of a list of version strings, or undefined for an empty list
 */
export function newestVersion(versions: string[]): string | undefined {
  let newest: string | undefined;
  for (const version of versions) {
    if (newest === undefined || compareVersions(version, newest) > 0) {
      newest = version;
    }
  }
  return newest;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class VersionResolver {
  constructor(
    private downloader: IDownloader,
    private sources: VersionSources,
    private platformTag: string,
    private logger: ILogger
  ) {}

  /**
   * Latest stable release that ships an archive for this platform
   * @throws InstallerError ResolutionError
   */
  public async resolveLatest(): Promise<ReleaseVersion> {
    if (this.sources.structuredManifest) {
      const fromManifest = await this.latestFromManifest();
      if (fromManifest) {
        return this.validate(fromManifest);
      }
    }
    return this.validate(await this.latestFromIndex());
  }

  /**
   * Empty or blank input selects latest; anything else is returned trimmed, not yet validated
   */
  public promptOrDefault(latest: ReleaseVersion, userInput?: string): string {
    const trimmed = userInput?.trim() ?? '';
    return trimmed === '' ? latest : trimmed;
  }

  /**
   * @throws InstallerError InvalidVersionFormat unless the version is X.Y.Z
   */
  public validate(version: string): ReleaseVersion {
    if (!isReleaseVersion(version)) {
      throw new InstallerError(
        'InvalidVersionFormat',
        `Invalid version format: "${version}". Expected X.Y.Z, e.g. 1.22.3`
      );
    }
    return version;
  }

  private async latestFromManifest(): Promise<string | undefined> {
    try {
      const manifest = parseReleaseManifest(await this.downloader.fetchText(this.sources.manifestUrl));
      const versions = stableVersionsFor(manifest, this.platformTag, ARCHIVE_EXTENSION).filter(isReleaseVersion);
      const latest = newestVersion(versions);
      if (!latest) {
        this.logger.debug(`No stable ${this.platformTag} release in manifest, falling back to the release index`);
      }
      return latest;
    } catch (error) {
      this.logger.debug(
        `Release manifest unavailable (${error instanceof Error ? error.message : String(error)}), falling back to the release index`
      );
      return undefined;
    }
  }

  private async latestFromIndex(): Promise<string> {
    let page: string;
    try {
      page = await this.downloader.fetchText(this.sources.releaseIndexUrl);
    } catch (error) {
      throw new InstallerError('ResolutionError', `Failed to fetch release index ${this.sources.releaseIndexUrl}`, error);
    }

    const pattern = new RegExp(
      `go(\\d+\\.\\d+\\.\\d+)\\.${escapeRegExp(this.platformTag)}${escapeRegExp(ARCHIVE_EXTENSION)}`,
      'g'
    );
    const versions: string[] = [];
    for (const match of page.matchAll(pattern)) {
      if (match[1]) versions.push(match[1]);
    }

    const latest = newestVersion(versions);
    if (!latest) {
      throw new InstallerError('ResolutionError', `No release archive for ${this.platformTag} found in the release index`);
    }
    return latest;
  }
}
