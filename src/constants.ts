/**
 * Constants for gostrap defaults and upstream locations
 */

import { tmpdir } from 'os';
import { join } from 'path';

export const APP_NAME = 'gostrap';
export const APP_VERSION = '0.1.0';

// Name of the distribution directory inside the archive and under the install root
export const DISTRIBUTION_NAME = 'go';

// Upstream release index and downloads
export const GO_RELEASE_INDEX_URL = 'https://go.dev/dl/';
export const GO_RELEASE_MANIFEST_URL = 'https://go.dev/dl/?mode=json&include=all';
export const GO_DOWNLOAD_BASE_URL = 'https://go.dev/dl/';

export const ARCHIVE_EXTENSION = '.tar.gz';

// Install roots
export const SYSTEM_INSTALL_ROOT = '/usr/local';
export const USER_INSTALL_ROOT = '~/.local';

// Lock marker shared by every run on this machine
export const DEFAULT_LOCK_PATH = join(tmpdir(), 'golang_install.lock');
export const SCRATCH_PREFIX = `${APP_NAME}-`;

// Shell startup files, checked in this order
export const SUPPORTED_PROFILES = ['.zshrc', '.bashrc', '.bash_profile'];
export const PROFILE_BLOCK_MARKER = '# Golang PATH';
export const PROFILE_BACKUP_EXTENSION = '.bak';

// Number of lines after the artifact filename searched for its digest
export const DEFAULT_CHECKSUM_WINDOW = 5;
export const SHA256_HEX_LENGTH = 64;

// Homebrew cask removed before a system-wide install
export const DEFAULT_FOREIGN_CASK = 'golang';

// Commands a system-wide install shells out to
export const SYSTEM_MODE_COMMANDS = ['sudo', 'tar'];

export const VERSION_PATTERN = /^\d+\.\d+\.\d+$/;

/**
 * Archive filename for a version and platform tag, e.g. go1.22.3.linux-amd64.tar.gz
 */
export function getArtifactFilename(version: string, platformTag: string): string {
  return `go${version}.${platformTag}${ARCHIVE_EXTENSION}`;
}

/**
 * Download URL for an artifact filename under the given base URL
 */
export function getArtifactUrl(baseUrl: string, filename: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}${filename}`;
}
