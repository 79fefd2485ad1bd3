/**
 * Shell profile PATH setup
 */

import { join } from 'path';
import type { IFileSystemManager, ILogger } from '../interfaces.js';
import type { InstallPlan, ProfileUpdateResult } from '../types.js';
import { PROFILE_BACKUP_EXTENSION, PROFILE_BLOCK_MARKER } from '../constants.js';
import { InstallerError, describeError } from './errors.js';

export function buildProfileBlock(exportLine: string): string {
  return `\n${PROFILE_BLOCK_MARKER}\n${exportLine}\n`;
}

export class ShellProfileUpdater {
  constructor(
    private profileNames: string[],
    private homeDir: string,
    private fileSystemManager: IFileSystemManager,
    private logger: ILogger
  ) {}

  /**
   * Appends the PATH block to every existing profile that lacks the export line.
   * Files that do not exist are never created.
   */
  updateAll(plan: InstallPlan): ProfileUpdateResult {
    const result: ProfileUpdateResult = { updatedCount: 0, updated: [], skipped: [], failed: [] };

    for (const name of this.profileNames) {
      const profilePath = join(this.homeDir, name);
      if (!this.fileSystemManager.isFile(profilePath)) {
        continue;
      }

      try {
        if (this.fileSystemManager.readFile(profilePath).includes(plan.pathExportLine)) {
          this.logger.debug(`${profilePath} already exports ${plan.binDir}`);
          result.skipped.push(profilePath);
          continue;
        }

        this.backup(profilePath);
        this.fileSystemManager.appendFile(profilePath, buildProfileBlock(plan.pathExportLine));
        this.logger.success(`Updated ${profilePath}`);
        result.updated.push(profilePath);
      } catch (error) {
        this.logger.warn(`Skipping ${profilePath}: ${describeError(error)}`);
        result.failed.push(profilePath);
      }
    }

    result.updatedCount = result.updated.length;
    return result;
  }

  private backup(profilePath: string): void {
    const backupPath = `${profilePath}${PROFILE_BACKUP_EXTENSION}`;
    try {
      this.fileSystemManager.copyFile(profilePath, backupPath);
    } catch (error) {
      throw new InstallerError('ProfileBackupError', `Could not back up ${profilePath} to ${backupPath}`, error);
    }
  }
}
