/**
 * Confirms that the installed toolchain runs
 */

import { join } from 'path';
import type { ICommandRunner } from '../interfaces.js';
import type { VerificationReport } from '../types.js';
import { InstallerError } from './errors.js';

const REPORTED_VERSION = /go\d+(\.\d+)*/;

export class PostInstallVerifier {
  constructor(private commandRunner: ICommandRunner) {}

  /**
   * Runs `go version` and `go env` from the fresh install
   * @throws InstallerError PostInstallVerificationFailed
   */
  verify(installDir: string): VerificationReport {
    const goBinary = join(installDir, 'bin', 'go');

    const versionOutput = this.runGo(goBinary, 'version');
    this.runGo(goBinary, 'env');

    const reportedVersion = REPORTED_VERSION.exec(versionOutput)?.[0];
    if (!reportedVersion) {
      throw new InstallerError('PostInstallVerificationFailed', `Unrecognised output from ${goBinary} version: ${versionOutput}`);
    }
    return { versionOutput, reportedVersion };
  }

  private runGo(goBinary: string, subcommand: string): string {
    const result = this.commandRunner.run(goBinary, [subcommand]);
    if (result.error) {
      throw new InstallerError('PostInstallVerificationFailed', `Could not run ${goBinary} ${subcommand}`, result.error);
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim();
      throw new InstallerError(
        'PostInstallVerificationFailed',
        `${goBinary} ${subcommand} exited with status ${result.exitCode}${detail ? `: ${detail}` : ''}`
      );
    }
    const output = result.stdout.trim();
    if (!output) {
      throw new InstallerError('PostInstallVerificationFailed', `${goBinary} ${subcommand} produced no output`);
    }
    return output;
  }
}
