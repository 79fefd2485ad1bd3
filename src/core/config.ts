/**
 * Configuration management with smol-toml library
 * Loads and validates the optional gostrap config.toml settings file
 */

import { join } from 'path';
import { parse } from 'smol-toml';
import { z } from 'zod';
import type { GostrapSettings } from '../types.js';
import type { IConfigManager, IFileSystemManager, IPlatformDetector } from '../interfaces.js';
import {
  APP_NAME,
  DEFAULT_CHECKSUM_WINDOW,
  DEFAULT_FOREIGN_CASK,
  DEFAULT_LOCK_PATH,
  GO_DOWNLOAD_BASE_URL,
  GO_RELEASE_INDEX_URL,
  GO_RELEASE_MANIFEST_URL,
  SUPPORTED_PROFILES,
  SYSTEM_INSTALL_ROOT,
  USER_INSTALL_ROOT,
} from '../constants.js';
import { InstallerError } from './errors.js';

export const SettingsFileSchema = z
  .object({
    release_index_url: z.string().url().default(GO_RELEASE_INDEX_URL),
    manifest_url: z.string().url().default(GO_RELEASE_MANIFEST_URL),
    download_base_url: z.string().url().default(GO_DOWNLOAD_BASE_URL),
    structured_manifest: z.boolean().default(true),
    lock_path: z.string().min(1).default(DEFAULT_LOCK_PATH),
    profiles: z.array(z.string().min(1)).default([...SUPPORTED_PROFILES]),
    checksum_window: z.number().int().min(0).default(DEFAULT_CHECKSUM_WINDOW),
    foreign_cask: z.string().min(1).default(DEFAULT_FOREIGN_CASK),
    system_root: z.string().min(1).default(SYSTEM_INSTALL_ROOT),
    user_root: z.string().min(1).default(USER_INSTALL_ROOT),
  })
  .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export interface ConfigManagerOptions {
  /** Explicit path from --config; takes precedence over the environment */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager implements IConfigManager {
  private fileSystemManager: IFileSystemManager;
  private platformDetector: IPlatformDetector;
  private options: ConfigManagerOptions;

  constructor(fileSystemManager: IFileSystemManager, platformDetector: IPlatformDetector, options: ConfigManagerOptions = {}) {
    this.fileSystemManager = fileSystemManager;
    this.platformDetector = platformDetector;
    this.options = options;
  }

  /**
   * Settings file location: --config, $GOSTRAP_CONFIG, then the XDG config dir
   */
  public getConfigPath(): string {
    const env = this.options.env ?? process.env;
    if (this.options.configPath) {
      return this.platformDetector.expandHomePath(this.options.configPath);
    }
    if (env.GOSTRAP_CONFIG) {
      return this.platformDetector.expandHomePath(env.GOSTRAP_CONFIG);
    }
    const configHome = env.XDG_CONFIG_HOME || join(this.platformDetector.getHomeDir(), '.config');
    return join(configHome, APP_NAME, 'config.toml');
  }

  /**
   * Load settings, falling back to defaults when no file exists
   * @throws InstallerError ConfigError when the file is unreadable or invalid
   */
  public load(): GostrapSettings {
    const configPath = this.getConfigPath();
    if (!this.fileSystemManager.fileExists(configPath)) {
      return this.toSettings(SettingsFileSchema.parse({}));
    }

    let raw: unknown;
    try {
      raw = parse(this.fileSystemManager.readFile(configPath));
    } catch (error) {
      throw new InstallerError('ConfigError', `Could not parse ${configPath}`, error);
    }

    const result = SettingsFileSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new InstallerError('ConfigError', `Invalid settings in ${configPath}: ${details}`);
    }
    return this.toSettings(result.data);
  }

  private toSettings(file: SettingsFile): GostrapSettings {
    return {
      releaseIndexUrl: file.release_index_url,
      manifestUrl: file.manifest_url,
      downloadBaseUrl: file.download_base_url,
      structuredManifest: file.structured_manifest,
      lockPath: this.platformDetector.expandHomePath(file.lock_path),
      profiles: file.profiles,
      checksumWindow: file.checksum_window,
      foreignCask: file.foreign_cask,
      systemRoot: file.system_root,
      userRoot: file.user_root,
    };
  }
}
