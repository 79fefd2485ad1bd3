import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import * as tar from 'tar';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TarArchiveExtractor } from '../../../src/utils/archive.js';
import { FileSystemManager } from '../../../src/utils/filesystem.js';
import { FakeCommandRunner, failed, makeTempDir, ok, removeTempDir } from '../../setup.js';

describe('TarArchiveExtractor', () => {
  let tempDir: string;
  let archivePath: string;

  beforeEach(async () => {
    tempDir = makeTempDir('archive');
    const staging = join(tempDir, 'staging');
    mkdirSync(join(staging, 'go', 'bin'), { recursive: true });
    writeFileSync(join(staging, 'go', 'bin', 'go'), 'binary');
    writeFileSync(join(staging, 'go', 'VERSION'), 'go1.20.12\n');
    archivePath = join(tempDir, 'go1.20.12.linux-amd64.tar.gz');
    await tar.c({ gzip: true, file: archivePath, cwd: staging }, ['go']);
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should keep the top-level go directory under the destination', async () => {
    const destination = join(tempDir, 'root');
    const extractor = new TarArchiveExtractor(new FileSystemManager(), new FakeCommandRunner());

    await extractor.extract(archivePath, destination);

    expect(readFileSync(join(destination, 'go', 'VERSION'), 'utf-8')).toBe('go1.20.12\n');
    expect(existsSync(join(destination, 'go', 'bin', 'go'))).toBe(true);
  });

  it('should run sudo tar for elevated extraction', async () => {
    const runner = new FakeCommandRunner().on((command) => (command === 'sudo' ? ok() : undefined));
    const extractor = new TarArchiveExtractor(new FileSystemManager(), runner);

    await extractor.extract(archivePath, '/usr/local', { elevated: true });

    expect(runner.commandLines()).toEqual([`sudo tar -C /usr/local -xzf ${archivePath}`]);
    expect(runner.calls[0]?.options).toEqual({ interactive: true });
  });

  it('should fail when elevated tar exits non-zero', async () => {
    const runner = new FakeCommandRunner().on((command) => (command === 'sudo' ? failed(2) : undefined));
    const extractor = new TarArchiveExtractor(new FileSystemManager(), runner);

    await expect(extractor.extract(archivePath, '/usr/local', { elevated: true })).rejects.toThrow('tar exited with status 2');
  });

  it('should reject other archive formats', async () => {
    const extractor = new TarArchiveExtractor(new FileSystemManager(), new FakeCommandRunner());

    await expect(extractor.extract(join(tempDir, 'go.zip'), tempDir)).rejects.toThrow(/Unsupported archive format/);
  });

  it('should reject a corrupt archive', async () => {
    const corrupt = join(tempDir, 'corrupt.tar.gz');
    writeFileSync(corrupt, 'not gzip data');
    const extractor = new TarArchiveExtractor(new FileSystemManager(), new FakeCommandRunner());

    await expect(extractor.extract(corrupt, join(tempDir, 'out'))).rejects.toThrow();
  });
});
