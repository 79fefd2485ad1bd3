/**
 * Core interfaces for gostrap
 * These interfaces define the contracts between the orchestrator and the I/O it drives
 */

import type {
  ArtifactDescriptor,
  CommandOptions,
  CommandResult,
  DownloadProgress,
  GostrapSettings,
  InstallMode,
  ReleaseVersion,
} from './types.js';

// Network transport
export interface IDownloader {
  fetchText(url: string): Promise<string>;
  downloadFile(url: string, destination: string): Promise<void>;
}

// Archive extraction
export interface ExtractOptions {
  /** Extract through `sudo tar` because the destination needs elevated rights */
  elevated?: boolean;
}

export interface IArchiveExtractor {
  extract(archivePath: string, destinationRoot: string, options?: ExtractOptions): Promise<void>;
}

// Checksum lookup and verification
export interface IChecksumVerifier {
  fetchExpected(artifact: ArtifactDescriptor): Promise<string>;
  verify(artifact: ArtifactDescriptor, filePath: string): Promise<void>;
}

// Interactive input
export interface IPromptSource {
  chooseInstallMode(): Promise<InstallMode>;
  /** Returns the raw answer; an empty string means "use latest" */
  chooseVersion(latest: ReleaseVersion): Promise<string>;
}

// External commands
export interface ICommandRunner {
  run(command: string, args: string[], options?: CommandOptions): CommandResult;
  exists(command: string): boolean;
}

export interface IPrivilegeProbe {
  /** True when the process already runs as root */
  isElevated(): boolean;
  /** Probe (not assume) that elevated rights can be obtained */
  canElevate(): boolean;
}

// Installs made by another package manager, removed on a best-effort basis
export interface IForeignInstallDetector {
  readonly name: string;
  isInstalled(): boolean;
  uninstall(): void;
}

// Logging
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ILogger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// Progress reporting interface
export interface IProgressReporter {
  startProgress(message: string): void;
  updateProgress(progress: DownloadProgress): void;
  finishProgress(message?: string): void;
  reportError(error: Error): void;
}

// Process lifecycle hooks, so a run can clean up on exit and on signals
export type Unsubscribe = () => void;

export interface IProcessHooks {
  onExit(handler: () => void): Unsubscribe;
  onSignal(handler: (signal: NodeJS.Signals) => void): Unsubscribe;
}

// Platform detection interface
export interface IPlatformDetector {
  getPlatformTag(): string;
  getHomeDir(): string;
  expandHomePath(path: string): string;
}

// File system operations interface
export interface IFileSystemManager {
  createDirectory(path: string, recursive?: boolean): void;
  createExclusiveDirectory(path: string): boolean;
  createTempDirectory(prefix: string): string;
  removeDirectory(path: string, force?: boolean): void;
  copyFile(source: string, destination: string): void;
  fileExists(path: string): boolean;
  removeFile(path: string): void;
  readFile(path: string): string;
  appendFile(path: string, content: string): void;
  createWriteStream(path: string): NodeJS.WritableStream;
  isFile(path: string): boolean;
  ensureDirectory(path: string): void;
  safeRemove(path: string): void;
}

// Configuration management interface
export interface IConfigManager {
  load(): GostrapSettings;
  getConfigPath(): string;
}
