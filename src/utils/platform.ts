/**
 * Platform detection utilities for gostrap
 * Maps the host OS and architecture onto Go's archive naming
 */

import { homedir } from 'os';
import { join } from 'path';
import type { IPlatformDetector } from '../interfaces.js';

export class PlatformDetector implements IPlatformDetector {
  private arch: string;
  private platform: string;

  constructor(platform: NodeJS.Platform = process.platform, arch: string = process.arch) {
    this.arch = this.detectArch(arch);
    this.platform = this.detectPlatform(platform);
  }

  /**
   * Platform tag used in archive names, e.g. linux-amd64
   */
  public getPlatformTag(): string {
    return `${this.platform}-${this.arch}`;
  }

  public getHomeDir(): string {
    const home = process.env.HOME || homedir();
    if (!home) {
      throw new Error('Unable to determine home directory');
    }
    return home;
  }

  /**
   * Expand tilde (~) in file paths to the home directory
   */
  public expandHomePath(path: string): string {
    if (path === '~') {
      return this.getHomeDir();
    }
    if (path.startsWith('~/')) {
      return join(this.getHomeDir(), path.slice(2));
    }
    return path;
  }

  private detectArch(arch: string): string {
    switch (arch) {
      case 'x64': return 'amd64';
      case 'arm64': return 'arm64';
      case 'ia32': return '386';
      case 'arm': return 'armv6l';
      default: return arch;
    }
  }

  private detectPlatform(platform: NodeJS.Platform): string {
    switch (platform) {
      case 'linux': return 'linux';
      case 'darwin': return 'darwin';
      case 'freebsd': return 'freebsd';
      default: return platform;
    }
  }
}
