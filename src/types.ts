// Type definitions for gostrap

export type InstallMode = 'system' | 'user';

/**
 * A validated X.Y.Z release version. Only VersionResolver.validate produces one.
 */
export type ReleaseVersion = string & { readonly __brand: 'ReleaseVersion' };

export interface InstallPlan {
  readonly mode: InstallMode;
  /** Directory the archive is unpacked into (its top-level dir becomes targetDir) */
  readonly installRoot: string;
  readonly targetDir: string;
  readonly binDir: string;
  readonly requiresPrivilege: boolean;
  /** Line appended to shell profiles, e.g. export PATH=$HOME/.local/go/bin:$PATH */
  readonly pathExportLine: string;
}

export interface ArtifactDescriptor {
  version: ReleaseVersion;
  platformTag: string;
  filename: string;
  url: string;
  /** Filled just before verification, always fetched fresh */
  expectedChecksum?: string;
}

export interface VerificationReport {
  /** Full output of `go version` */
  versionOutput: string;
  /** Version token reported by the binary, e.g. go1.22.3 */
  reportedVersion: string;
}

export interface ProfileUpdateResult {
  updatedCount: number;
  updated: string[];
  skipped: string[];
  failed: string[];
}

export type InstallState =
  | 'start'
  | 'lock-acquired'
  | 'plan-ready'
  | 'version-resolved'
  | 'previous-removed'
  | 'downloaded'
  | 'verified'
  | 'extracted'
  | 'path-updated'
  | 'post-verified'
  | 'done'
  | 'failed';

export interface InstallRequest {
  mode: InstallMode;
  /** Explicit version; when absent the latest release is offered */
  version?: string;
}

export interface InstallOutcome {
  version: ReleaseVersion;
  plan: InstallPlan;
  artifact: ArtifactDescriptor;
  profiles: ProfileUpdateResult;
  report: VerificationReport;
  states: InstallState[];
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Set when the command could not be spawned at all */
  error?: Error;
}

export interface CommandOptions {
  /** Let the child use the terminal, e.g. for a sudo password prompt */
  interactive?: boolean;
}

export interface DownloadProgress {
  filename: string;
  bytesDownloaded: number;
  totalBytes: number;
  percentage: number;
}

export interface GostrapSettings {
  releaseIndexUrl: string;
  manifestUrl: string;
  downloadBaseUrl: string;
  structuredManifest: boolean;
  lockPath: string;
  profiles: string[];
  checksumWindow: number;
  foreignCask: string;
  systemRoot: string;
  userRoot: string;
}
