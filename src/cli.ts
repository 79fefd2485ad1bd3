import { Command, Option } from 'commander';
import type { Application, ApplicationOptions } from './app.js';
import { APP_NAME, APP_VERSION } from './constants.js';
import { describeError } from './core/errors.js';
import { parseInstallMode } from './cli/prompts/validators.js';
import { colors } from './utils/colors.js';
import process from "node:process";

export interface CliOptions {
  mode?: string;
  release?: string;
  config?: string;
  verbose?: boolean;
}

/**
 * What the CLI needs from its host process
 */
export interface CliRuntime {
  loadApplication(options: ApplicationOptions): Promise<Application>;
  isInteractive(): boolean;
  exit(code: number): void;
}

const nodeRuntime: CliRuntime = {
  // Loaded on demand so --help and --version stay fast
  loadApplication: async (options) => (await import('./app.js')).createApplication(options),
  isInteractive: () => Boolean(process.stdin.isTTY),
  exit: (code) => process.exit(code),
};

export function setupCLI(runtime: CliRuntime = nodeRuntime): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Download, verify and install the Go toolchain, then put it on PATH')
    .version(APP_VERSION)
    .addOption(new Option('-m, --mode <mode>', 'installation type').choices(['system', 'user']))
    .option('-r, --release <version>', 'install this X.Y.Z release instead of the latest')
    .option('-c, --config <path>', 'settings file (default: $GOSTRAP_CONFIG or ~/.config/gostrap/config.toml)')
    .option('--verbose', 'print debug output')
    .action(async (options: CliOptions) => {
      const interactive = runtime.isInteractive();
      let logError = (message: string) => console.error(colors.red(`[ERROR]: ${message}`));
      try {
        const app = await runtime.loadApplication({ configPath: options.config, verbose: options.verbose, interactive });
        logError = (message) => app.logger.error(message);

        let mode = parseInstallMode(options.mode);
        if (!mode) {
          if (!app.promptSource) {
            throw new Error('--mode is required when not running in a terminal');
          }
          mode = await app.promptSource.chooseInstallMode();
        }

        const outcome = await app.orchestrator.run({ mode, version: options.release });
        app.logger.success(`Go ${outcome.version} installed in ${outcome.plan.targetDir}`);
        if (outcome.profiles.updatedCount > 0) {
          app.logger.info('Open a new shell (or source your profile) to use go');
        }
      } catch (error) {
        logError(describeError(error));
        runtime.exit(1);
      }
    });

  return program;
}
