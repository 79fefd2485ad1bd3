/**
 * Resolves an install mode into a concrete, frozen InstallPlan
 */

import { join } from 'path';
import type { ICommandRunner, IFileSystemManager, IPlatformDetector, IPrivilegeProbe } from '../interfaces.js';
import type { InstallMode, InstallPlan } from '../types.js';
import { DISTRIBUTION_NAME, SYSTEM_MODE_COMMANDS } from '../constants.js';
import { InstallerError } from './errors.js';

export interface InstallRoots {
  systemRoot: string;
  /** May start with ~, which profiles see as $HOME */
  userRoot: string;
}

/**
 * PATH line for shell profiles. A leading ~ is written as a literal $HOME so
 * the profile keeps working if the home directory moves.
 */
export function buildPathExportLine(root: string): string {
  const profileRoot = root === '~' ? '$HOME' : root.startsWith('~/') ? `$HOME/${root.slice(2)}` : root;
  return `export PATH=${profileRoot}/${DISTRIBUTION_NAME}/bin:$PATH`;
}

export class InstallPlanner {
  constructor(
    private roots: InstallRoots,
    private platformDetector: IPlatformDetector,
    private fileSystemManager: IFileSystemManager,
    private commandRunner: ICommandRunner,
    private privilegeProbe: IPrivilegeProbe
  ) {}

  /**
   * @throws InstallerError DependencyMissing, PrivilegeRequired or DirectoryCreateError
   */
  buildPlan(mode: InstallMode): InstallPlan {
    return mode === 'system' ? this.systemPlan() : this.userPlan();
  }

  private systemPlan(): InstallPlan {
    // Running as root needs neither sudo nor a probe
    const requiresPrivilege = !this.privilegeProbe.isElevated();

    if (requiresPrivilege) {
      const missing = SYSTEM_MODE_COMMANDS.filter((command) => !this.commandRunner.exists(command));
      if (missing.length > 0) {
        throw new InstallerError('DependencyMissing', `Required command(s) not found: ${missing.join(', ')}`);
      }
      if (!this.privilegeProbe.canElevate()) {
        throw new InstallerError('PrivilegeRequired', 'A system-wide install needs administrator rights (sudo)');
      }
    }

    const installRoot = this.roots.systemRoot;
    return this.freeze('system', installRoot, requiresPrivilege, buildPathExportLine(installRoot));
  }

  private userPlan(): InstallPlan {
    const installRoot = this.platformDetector.expandHomePath(this.roots.userRoot);
    try {
      this.fileSystemManager.createDirectory(installRoot, true);
    } catch (error) {
      throw new InstallerError('DirectoryCreateError', `Could not create ${installRoot}`, error);
    }
    return this.freeze('user', installRoot, false, buildPathExportLine(this.roots.userRoot));
  }

  private freeze(mode: InstallMode, installRoot: string, requiresPrivilege: boolean, pathExportLine: string): InstallPlan {
    const targetDir = join(installRoot, DISTRIBUTION_NAME);
    return Object.freeze({
      mode,
      installRoot,
      targetDir,
      binDir: join(targetDir, 'bin'),
      requiresPrivilege,
      pathExportLine,
    });
  }
}
