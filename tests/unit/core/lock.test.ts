import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InstallationLock } from '../../../src/core/lock.js';
import { FileSystemManager } from '../../../src/utils/filesystem.js';
import { captureError, makeTempDir, removeTempDir } from '../../setup.js';

describe('InstallationLock', () => {
  let tempDir: string;
  let lockPath: string;
  let lock: InstallationLock;

  beforeEach(() => {
    tempDir = makeTempDir('lock');
    lockPath = join(tempDir, 'golang_install.lock');
    lock = new InstallationLock(lockPath, new FileSystemManager());
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should create the marker on acquire and remove it on release', () => {
    const handle = lock.acquire();
    expect(handle.path).toBe(lockPath);
    expect(existsSync(lockPath)).toBe(true);

    handle.release();
    expect(existsSync(lockPath)).toBe(false);
    expect(handle.isReleased).toBe(true);
  });

  it('should fail fast with AlreadyRunning while the marker exists', () => {
    lock.acquire();

    expect(captureError(() => lock.acquire())).toMatchObject({ kind: 'AlreadyRunning' });
    expect(existsSync(lockPath)).toBe(true);
  });

  it('should treat a marker left by another process as held', () => {
    mkdirSync(lockPath);

    expect(captureError(() => lock.acquire())).toMatchObject({ kind: 'AlreadyRunning' });
  });

  it('should release idempotently', () => {
    const handle = lock.acquire();
    handle.release();
    expect(() => handle.release()).not.toThrow();

    // A second release must not remove a marker that a later run now holds
    const next = lock.acquire();
    handle.release();
    expect(existsSync(lockPath)).toBe(true);
    next.release();
  });

  it('should be acquirable again after release', () => {
    lock.acquire().release();
    expect(() => lock.acquire()).not.toThrow();
  });
});
