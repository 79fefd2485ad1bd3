/**
 * Interactive answers for the installer, asked with @clack/prompts
 */

import type { IPromptSource } from '../interfaces.js';
import type { InstallMode, ReleaseVersion } from '../types.js';
import { textPrompt } from './prompts/common.js';
import { parseInstallChoice, validateInstallChoice } from './prompts/validators.js';

export class ClackPromptSource implements IPromptSource {
  async chooseInstallMode(): Promise<InstallMode> {
    // validateInstallChoice makes clack re-ask until the answer parses
    const answer = await textPrompt(
      'Installation type: 1) system-wide (/usr/local/go)  2) current user ($HOME/.local/go)',
      '1 or 2',
      validateInstallChoice
    );
    const mode = parseInstallChoice(answer);
    if (!mode) {
      throw new Error(`Invalid installation type: ${answer}`);
    }
    return mode;
  }

  /**
   * The answer is returned as typed; the installer validates it
   */
  async chooseVersion(latest: ReleaseVersion): Promise<string> {
    return textPrompt(`Go version to install (Enter for ${latest})`, latest, undefined, latest);
  }
}
