/**
 * Machine-wide installation lock
 *
 * The marker is a directory created without `recursive`, so creation either
 * succeeds for exactly one process or fails with EEXIST. There is no waiting
 * and no stale-lock takeover: a leftover marker must be removed by hand.
 */

import type { IFileSystemManager } from '../interfaces.js';
import { InstallerError } from './errors.js';

export class LockHandle {
  private released = false;

  constructor(
    public readonly path: string,
    private fileSystemManager: IFileSystemManager
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Synchronous and idempotent so it can also run from an exit listener
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.fileSystemManager.safeRemove(this.path);
  }
}

export class InstallationLock {
  constructor(
    private lockPath: string,
    private fileSystemManager: IFileSystemManager
  ) {}

  /**
   * @throws InstallerError AlreadyRunning when another run holds the lock
   */
  acquire(): LockHandle {
    let created: boolean;
    try {
      created = this.fileSystemManager.createExclusiveDirectory(this.lockPath);
    } catch (error) {
      throw new InstallerError('DirectoryCreateError', `Could not create lock ${this.lockPath}`, error);
    }

    if (!created) {
      throw new InstallerError(
        'AlreadyRunning',
        `Another installation is in progress (lock ${this.lockPath}). Remove it if no installer is running.`
      );
    }
    return new LockHandle(this.lockPath, this.fileSystemManager);
  }
}
