import { beforeEach, describe, expect, it } from 'vitest';
import { VersionResolver, compareVersions, newestVersion } from '../../../src/core/version.js';
import { FakeDownloader, RecordingLogger, captureError } from '../../setup.js';

const INDEX_URL = 'https://downloads.example.test/dl/';
const MANIFEST_URL = 'https://downloads.example.test/dl/?mode=json';

function manifestEntry(version: string, stable: boolean, tags: string[]) {
  return {
    version: `go${version}`,
    stable,
    files: tags.map((tag) => ({
      filename: `go${version}.${tag}.tar.gz`,
      os: tag.split('-')[0],
      arch: tag.split('-')[1],
      version: `go${version}`,
      sha256: 'a'.repeat(64),
      size: 1024,
      kind: 'archive',
    })),
  };
}

describe('VersionResolver', () => {
  let downloader: FakeDownloader;
  let logger: RecordingLogger;

  const resolver = (structuredManifest: boolean) =>
    new VersionResolver(downloader, { releaseIndexUrl: INDEX_URL, manifestUrl: MANIFEST_URL, structuredManifest }, 'linux-amd64', logger);

  beforeEach(() => {
    downloader = new FakeDownloader();
    logger = new RecordingLogger();
  });

  describe('validate', () => {
    it('should accept X.Y.Z versions', () => {
      expect(resolver(false).validate('1.20.12')).toBe('1.20.12');
      expect(resolver(false).validate('0.0.0')).toBe('0.0.0');
    });

    it.each(['', '1.20', '1.20.12.1', 'v1.20.12', '1.x.3', ' 1.20.12', '1.21rc2'])(
      'should reject %j with InvalidVersionFormat',
      (input) => {
        expect(captureError(() => resolver(false).validate(input))).toMatchObject({ kind: 'InvalidVersionFormat' });
      }
    );
  });

  describe('promptOrDefault', () => {
    it('should use latest for empty or blank answers', () => {
      const latest = resolver(false).validate('1.22.3');
      expect(resolver(false).promptOrDefault(latest, '')).toBe('1.22.3');
      expect(resolver(false).promptOrDefault(latest, '   ')).toBe('1.22.3');
      expect(resolver(false).promptOrDefault(latest)).toBe('1.22.3');
    });

    it('should return other answers trimmed and unvalidated', () => {
      const latest = resolver(false).validate('1.22.3');
      expect(resolver(false).promptOrDefault(latest, ' 1.21.0 ')).toBe('1.21.0');
      expect(resolver(false).promptOrDefault(latest, 'banana')).toBe('banana');
    });
  });

  describe('resolveLatest', () => {
    it('should pick the newest version for the platform from the release index', async () => {
      downloader.texts.set(INDEX_URL, [
        '<a href="/dl/go1.21.5.linux-amd64.tar.gz">go1.21.5.linux-amd64.tar.gz</a>',
        '<a href="/dl/go1.21.10.linux-amd64.tar.gz">go1.21.10.linux-amd64.tar.gz</a>',
        '<a href="/dl/go1.9.2.linux-amd64.tar.gz">go1.9.2.linux-amd64.tar.gz</a>',
        '<a href="/dl/go1.22rc1.linux-amd64.tar.gz">go1.22rc1.linux-amd64.tar.gz</a>',
        '<a href="/dl/go1.22.0.darwin-arm64.tar.gz">go1.22.0.darwin-arm64.tar.gz</a>',
      ].join('\n'));

      await expect(resolver(false).resolveLatest()).resolves.toBe('1.21.10');
      expect(downloader.requests).toEqual([INDEX_URL]);
    });

    it('should prefer the newest stable release in the structured manifest', async () => {
      downloader.texts.set(MANIFEST_URL, JSON.stringify([
        manifestEntry('1.23rc1', false, ['linux-amd64']),
        manifestEntry('1.21.8', true, ['linux-amd64']),
        manifestEntry('1.22.1', true, ['linux-amd64', 'darwin-arm64']),
        manifestEntry('1.22.2', true, ['darwin-arm64']),
      ]));

      await expect(resolver(true).resolveLatest()).resolves.toBe('1.22.1');
      expect(downloader.requests).toEqual([MANIFEST_URL]);
    });

    it('should fall back to the release index when the manifest is unusable', async () => {
      downloader.texts.set(MANIFEST_URL, '<html>not json</html>');
      downloader.texts.set(INDEX_URL, 'go1.20.12.linux-amd64.tar.gz');

      await expect(resolver(true).resolveLatest()).resolves.toBe('1.20.12');
      expect(downloader.requests).toEqual([MANIFEST_URL, INDEX_URL]);
      expect(logger.messages('debug')).toHaveLength(1);
    });

    it('should fail with ResolutionError when the index is unreachable', async () => {
      await expect(resolver(false).resolveLatest()).rejects.toMatchObject({ kind: 'ResolutionError' });
    });

    it('should fail with ResolutionError when no archive matches the platform', async () => {
      downloader.texts.set(INDEX_URL, 'go1.22.0.darwin-arm64.tar.gz\ngo1.22.0.windows-amd64.zip');

      await expect(resolver(false).resolveLatest()).rejects.toMatchObject({
        kind: 'ResolutionError',
        message: 'No release archive for linux-amd64 found in the release index',
      });
    });
  });
});

describe('compareVersions', () => {
  it('should compare numerically segment by segment', () => {
    expect(compareVersions('1.10.0', '1.9.9')).toBeGreaterThan(0);
    expect(compareVersions('1.20.2', '1.20.12')).toBeLessThan(0);
    expect(compareVersions('1.22.0', '1.22.0')).toBe(0);
  });

  it('should return undefined as the newest of nothing', () => {
    expect(newestVersion([])).toBeUndefined();
    expect(newestVersion(['1.2.3', '1.10.0', '1.9.0'])).toBe('1.10.0');
  });
});
