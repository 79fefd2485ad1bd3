/**
 * Installer error kinds
 *
 * Every failure the orchestrator can surface is an InstallerError carrying one of
 * these kinds. The CLI prints the message with an `[ERROR]:` prefix and exits 1.
 */

export type InstallErrorKind =
  | 'DependencyMissing'
  | 'AlreadyRunning'
  | 'ResolutionError'
  | 'InvalidVersionFormat'
  | 'PrivilegeRequired'
  | 'DirectoryCreateError'
  | 'PreviousRemovalError'
  | 'DownloadError'
  | 'ChecksumFetchError'
  | 'ChecksumMismatch'
  | 'ExtractError'
  | 'ProfileBackupError'
  | 'PostInstallVerificationFailed'
  | 'ConfigError';

export class InstallerError extends Error {
  public readonly kind: InstallErrorKind;
  public override readonly cause?: Error;

  constructor(kind: InstallErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = 'InstallerError';
    this.kind = kind;
    if (cause !== undefined) {
      this.cause = toError(cause);
    }
  }
}

export function isInstallerError(error: unknown, kind?: InstallErrorKind): error is InstallerError {
  return error instanceof InstallerError && (kind === undefined || error.kind === kind);
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Message of an error, including its cause when one is attached
 */
export function describeError(error: unknown): string {
  if (error instanceof InstallerError && error.cause) {
    return `${error.message}: ${error.cause.message}`;
  }
  return toError(error).message;
}
