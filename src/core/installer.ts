/**
 * Installation orchestration for the Go distribution
 *
 * Drives a run through lock, plan, version, previous-install removal, download,
 * checksum, extraction, shell profiles and post-install checks. The lock and the
 * scratch workspace are torn down on every exit path, including signals.
 */

import { join } from 'path';
import type {
  IArchiveExtractor,
  IChecksumVerifier,
  IDownloader,
  IFileSystemManager,
  IForeignInstallDetector,
  ILogger,
  IPlatformDetector,
  IProcessHooks,
  IPromptSource,
  ICommandRunner,
  Unsubscribe,
} from '../interfaces.js';
import type {
  ArtifactDescriptor,
  InstallOutcome,
  InstallPlan,
  InstallRequest,
  InstallState,
  ReleaseVersion,
} from '../types.js';
import { SCRATCH_PREFIX, getArtifactFilename, getArtifactUrl } from '../constants.js';
import { signalExitCode } from '../utils/process.js';
import { InstallerError, describeError, isInstallerError, type InstallErrorKind } from './errors.js';
import type { InstallationLock, LockHandle } from './lock.js';
import type { InstallPlanner } from './plan.js';
import type { PostInstallVerifier } from './post-install.js';
import type { ShellProfileUpdater } from './profiles.js';
import type { VersionResolver } from './version.js';

export interface InstallerComponents {
  lock: InstallationLock;
  planner: InstallPlanner;
  versionResolver: VersionResolver;
  checksumVerifier: IChecksumVerifier;
  profileUpdater: ShellProfileUpdater;
  postInstallVerifier: PostInstallVerifier;
  downloader: IDownloader;
  archiveExtractor: IArchiveExtractor;
  fileSystemManager: IFileSystemManager;
  platformDetector: IPlatformDetector;
  commandRunner: ICommandRunner;
  processHooks: IProcessHooks;
  logger: ILogger;
  downloadBaseUrl: string;
  promptSource?: IPromptSource;
  foreignDetectors?: IForeignInstallDetector[];
  /** Called after signal cleanup; defaults to process.exit */
  exit?: (code: number) => void;
}

export class InstallationOrchestrator {
  private readonly components: InstallerComponents;
  private readonly exit: (code: number) => void;

  constructor(components: InstallerComponents) {
    this.components = components;
    this.exit = components.exit ?? ((code) => process.exit(code));
  }

  /**
   * Install the requested version
   * @throws InstallerError for every fatal condition, after cleanup
   */
  public async run(request: InstallRequest): Promise<InstallOutcome> {
    const { logger, fileSystemManager, processHooks } = this.components;
    const states: InstallState[] = [];
    const transition = (state: InstallState): void => {
      states.push(state);
      logger.debug(`state -> ${state}`);
    };

    let lockHandle: LockHandle | undefined;
    let scratchDir: string | undefined;
    const unsubscribes: Unsubscribe[] = [];

    const cleanup = (): void => {
      if (scratchDir) {
        fileSystemManager.safeRemove(scratchDir);
        scratchDir = undefined;
      }
      lockHandle?.release();
    };

    transition('start');
    try {
      lockHandle = this.components.lock.acquire();
      unsubscribes.push(processHooks.onExit(cleanup));
      unsubscribes.push(processHooks.onSignal((signal) => {
        logger.warn(`Received ${signal}, cleaning up`);
        cleanup();
        this.exit(signalExitCode(signal));
      }));
      transition('lock-acquired');

      const plan = this.components.planner.buildPlan(request.mode);
      logger.info(`Installing into ${plan.targetDir} (${plan.mode} mode)`);
      transition('plan-ready');

      const version = await this.resolveVersion(request);
      logger.info(`Selected version ${version}`);
      transition('version-resolved');

      this.removePrevious(plan);
      transition('previous-removed');

      scratchDir = this.createScratch();
      const artifact = this.describeArtifact(version);
      const archivePath = join(scratchDir, artifact.filename);
      await this.step('DownloadError', `Failed to download ${artifact.url}`, async () => {
        logger.info(`Downloading ${artifact.url}`);
        await this.components.downloader.downloadFile(artifact.url, archivePath);
      });
      transition('downloaded');

      artifact.expectedChecksum = await this.step('ChecksumFetchError', `Failed to fetch checksum for ${artifact.filename}`, () =>
        this.components.checksumVerifier.fetchExpected(artifact)
      );
      await this.step('ChecksumMismatch', `Failed to verify ${artifact.filename}`, () =>
        this.components.checksumVerifier.verify(artifact, archivePath)
      );
      logger.success('Checksum verified');
      transition('verified');

      await this.step('ExtractError', `Failed to extract ${artifact.filename} into ${plan.installRoot}`, () =>
        this.components.archiveExtractor.extract(archivePath, plan.installRoot, { elevated: plan.requiresPrivilege })
      );
      transition('extracted');

      const profiles = this.components.profileUpdater.updateAll(plan);
      if (profiles.updatedCount === 0) {
        logger.warn(`No shell profile was updated. Add this line to your shell profile manually:\n  ${plan.pathExportLine}`);
      }
      transition('path-updated');

      const report = this.components.postInstallVerifier.verify(plan.targetDir);
      logger.success(report.versionOutput);
      transition('post-verified');

      transition('done');
      return { version, plan, artifact, profiles, report, states };
    } catch (error) {
      transition('failed');
      throw error;
    } finally {
      cleanup();
      for (const unsubscribe of unsubscribes) {
        unsubscribe();
      }
    }
  }

  private async resolveVersion(request: InstallRequest): Promise<ReleaseVersion> {
    const { versionResolver, promptSource, logger } = this.components;
    if (request.version !== undefined) {
      return versionResolver.validate(request.version.trim());
    }

    const latest = await versionResolver.resolveLatest();
    logger.info(`Latest release: ${latest}`);
    const answer = promptSource ? await promptSource.chooseVersion(latest) : '';
    return versionResolver.validate(versionResolver.promptOrDefault(latest, answer));
  }

  private removePrevious(plan: InstallPlan): void {
    const { fileSystemManager, commandRunner, logger } = this.components;

    if (fileSystemManager.fileExists(plan.targetDir)) {
      logger.info(`Removing previous installation at ${plan.targetDir}`);
      if (plan.requiresPrivilege) {
        const result = commandRunner.run('sudo', ['rm', '-rf', plan.targetDir], { interactive: true });
        if (result.error || result.exitCode !== 0) {
          throw new InstallerError(
            'PreviousRemovalError',
            `Failed to remove ${plan.targetDir} (status ${result.exitCode})`,
            result.error
          );
        }
      } else {
        try {
          fileSystemManager.removeDirectory(plan.targetDir);
        } catch (error) {
          throw new InstallerError('PreviousRemovalError', `Failed to remove ${plan.targetDir}`, error);
        }
      }
    }

    if (plan.mode !== 'system') {
      return;
    }
    for (const detector of this.components.foreignDetectors ?? []) {
      try {
        if (detector.isInstalled()) {
          logger.info(`Removing ${detector.name}`);
          detector.uninstall();
        }
      } catch (error) {
        logger.warn(`Could not remove ${detector.name}: ${describeError(error)}`);
      }
    }
  }

  private createScratch(): string {
    try {
      return this.components.fileSystemManager.createTempDirectory(SCRATCH_PREFIX);
    } catch (error) {
      throw new InstallerError('DirectoryCreateError', 'Could not create a scratch directory', error);
    }
  }

  private describeArtifact(version: ReleaseVersion): ArtifactDescriptor {
    const platformTag = this.components.platformDetector.getPlatformTag();
    const filename = getArtifactFilename(version, platformTag);
    return {
      version,
      platformTag,
      filename,
      url: getArtifactUrl(this.components.downloadBaseUrl, filename),
    };
  }

  /**
   * Run one step, giving errors that are not already InstallerErrors the step's kind
   */
  private async step<T>(kind: InstallErrorKind, message: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (isInstallerError(error)) {
        throw error;
      }
      throw new InstallerError(kind, message, error);
    }
  }
}
