/**
 * Wires the production implementations into an InstallationOrchestrator
 */

import type { ILogger, IPromptSource } from './interfaces.js';
import type { GostrapSettings } from './types.js';
import { ClackPromptSource } from './cli/prompt-source.js';
import { ChecksumVerifier } from './core/checksum.js';
import { ConfigManager } from './core/config.js';
import { HomebrewCaskDetector } from './core/foreign-install.js';
import { InstallationOrchestrator } from './core/installer.js';
import { InstallationLock } from './core/lock.js';
import { InstallPlanner } from './core/plan.js';
import { PostInstallVerifier } from './core/post-install.js';
import { ShellProfileUpdater } from './core/profiles.js';
import { VersionResolver } from './core/version.js';
import { TarArchiveExtractor } from './utils/archive.js';
import { HttpDownloader } from './utils/download.js';
import { FileSystemManager } from './utils/filesystem.js';
import { ConsoleLogger, isLogLevel } from './utils/logger.js';
import { PlatformDetector } from './utils/platform.js';
import { NodeProcessHooks, SpawnCommandRunner, SudoPrivilegeProbe } from './utils/process.js';
import { SpinnerProgressReporter } from './utils/progress.js';

export interface ApplicationOptions {
  configPath?: string;
  verbose?: boolean;
  /** Ask questions on the terminal; otherwise the latest release is taken */
  interactive: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface Application {
  orchestrator: InstallationOrchestrator;
  settings: GostrapSettings;
  logger: ILogger;
  promptSource?: IPromptSource;
}

export function createLogger(verbose: boolean | undefined, env: NodeJS.ProcessEnv): ConsoleLogger {
  if (verbose) {
    return new ConsoleLogger('debug');
  }
  const level = env.GOSTRAP_LOG_LEVEL?.toLowerCase();
  return new ConsoleLogger(isLogLevel(level) ? level : 'info');
}

export function createApplication(options: ApplicationOptions): Application {
  const env = options.env ?? process.env;
  const logger = createLogger(options.verbose, env);

  const fileSystemManager = new FileSystemManager((message) => logger.warn(message));
  const platformDetector = new PlatformDetector();
  const configManager = new ConfigManager(fileSystemManager, platformDetector, { configPath: options.configPath, env });
  logger.debug(`Settings file: ${configManager.getConfigPath()}`);
  const settings = configManager.load();

  const commandRunner = new SpawnCommandRunner();
  const progressReporter = new SpinnerProgressReporter();
  const downloader = new HttpDownloader(fileSystemManager, progressReporter);
  const promptSource = options.interactive ? new ClackPromptSource() : undefined;

  const orchestrator = new InstallationOrchestrator({
    lock: new InstallationLock(settings.lockPath, fileSystemManager),
    planner: new InstallPlanner(
      { systemRoot: settings.systemRoot, userRoot: settings.userRoot },
      platformDetector,
      fileSystemManager,
      commandRunner,
      new SudoPrivilegeProbe(commandRunner)
    ),
    versionResolver: new VersionResolver(downloader, settings, platformDetector.getPlatformTag(), logger),
    checksumVerifier: new ChecksumVerifier(downloader, settings, logger),
    profileUpdater: new ShellProfileUpdater(settings.profiles, platformDetector.getHomeDir(), fileSystemManager, logger),
    postInstallVerifier: new PostInstallVerifier(commandRunner),
    downloader,
    archiveExtractor: new TarArchiveExtractor(fileSystemManager, commandRunner, progressReporter),
    fileSystemManager,
    platformDetector,
    commandRunner,
    processHooks: new NodeProcessHooks(),
    logger,
    downloadBaseUrl: settings.downloadBaseUrl,
    promptSource,
    foreignDetectors: [new HomebrewCaskDetector(commandRunner, settings.foreignCask)],
  });

  return { orchestrator, settings, logger, promptSource };
}
