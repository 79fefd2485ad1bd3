/**
 * Go installs owned by another package manager
 */

import type { ICommandRunner, IForeignInstallDetector } from '../interfaces.js';
import { InstallerError } from './errors.js';

export class HomebrewCaskDetector implements IForeignInstallDetector {
  readonly name: string;

  constructor(
    private commandRunner: ICommandRunner,
    private cask: string
  ) {
    this.name = `Homebrew cask ${cask}`;
  }

  isInstalled(): boolean {
    if (!this.commandRunner.exists('brew')) {
      return false;
    }
    const result = this.commandRunner.run('brew', ['list', '--cask', this.cask]);
    return !result.error && result.exitCode === 0;
  }

  /**
   * @throws InstallerError PreviousRemovalError
   */
  uninstall(): void {
    const result = this.commandRunner.run('brew', ['uninstall', '--cask', this.cask], { interactive: true });
    if (result.error || result.exitCode !== 0) {
      throw new InstallerError(
        'PreviousRemovalError',
        `brew uninstall --cask ${this.cask} failed with status ${result.exitCode}`,
        result.error
      );
    }
  }
}
