/**
 * File System Manager
 *
 * Handles all file system operations for gostrap: directories, the lock marker,
 * scratch space, profile files and their backups, with typed errors.
 */

import {
  appendFileSync,
  copyFileSync,
  createWriteStream,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  statSync,
} from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { IFileSystemManager } from '../interfaces.js';

/**
 * Custom error types for file system operations
 */
export class FileSystemError extends Error {
  public operation: string;
  public path: string;
  public override cause?: Error;

  constructor(message: string, operation: string, path: string, cause?: Error) {
    super(message);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = path;
    this.cause = cause;
  }
}

export class DirectoryError extends FileSystemError {
  constructor(message: string, path: string, cause?: Error) {
    super(message, 'directory', path, cause);
    this.name = 'DirectoryError';
  }
}

export class FileError extends FileSystemError {
  constructor(message: string, path: string, cause?: Error) {
    super(message, 'file', path, cause);
    this.name = 'FileError';
  }
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * FileSystemManager implementation
 *
 * Provides a clean interface for all file system operations with proper error handling
 */
export class FileSystemManager implements IFileSystemManager {
  private readonly warn: (message: string) => void;

  constructor(warn: (message: string) => void = (message) => console.warn(message)) {
    this.warn = warn;
  }

  /**
   * Creates a directory at the specified path
   * @param recursive - Whether to create parent directories (default: true)
   */
  createDirectory(path: string, recursive: boolean = true): void {
    try {
      if (!existsSync(path)) {
        mkdirSync(path, { recursive });
      }
    } catch (error) {
      throw new DirectoryError(`Failed to create directory: ${path}`, path, asError(error));
    }
  }

  /**
   * Atomically creates a single directory.
   * @returns false if something already exists at the path
   */
  createExclusiveDirectory(path: string): boolean {
    try {
      mkdirSync(path);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        return false;
      }
      throw new DirectoryError(`Failed to create directory: ${path}`, path, asError(error));
    }
  }

  /**
   * Creates a uniquely named directory under the OS temp dir
   */
  createTempDirectory(prefix: string): string {
    const base = join(tmpdir(), prefix);
    try {
      return mkdtempSync(base);
    } catch (error) {
      throw new DirectoryError(`Failed to create temporary directory: ${base}`, base, asError(error));
    }
  }

  /**
   * Removes a directory and all its contents
   * @param force - Whether to force removal (default: true)
   */
  removeDirectory(path: string, force: boolean = true): void {
    try {
      if (existsSync(path)) {
        rmSync(path, { recursive: true, force });
      }
    } catch (error) {
      throw new DirectoryError(`Failed to remove directory: ${path}`, path, asError(error));
    }
  }

  /**
   * Copies a file from source to destination
   */
  copyFile(source: string, destination: string): void {
    try {
      if (!existsSync(source)) {
        throw new Error(`Source file does not exist: ${source}`);
      }

      this.createDirectory(dirname(destination));
      copyFileSync(source, destination);
    } catch (error) {
      throw new FileError(
        `Failed to copy file from ${source} to ${destination}`,
        destination,
        asError(error)
      );
    }
  }

  fileExists(path: string): boolean {
    return existsSync(path);
  }

  removeFile(path: string): void {
    try {
      if (existsSync(path)) {
        rmSync(path);
      }
    } catch (error) {
      throw new FileError(`Failed to remove file: ${path}`, path, asError(error));
    }
  }

  readFile(path: string): string {
    try {
      if (!existsSync(path)) {
        throw new Error(`File does not exist: ${path}`);
      }
      return readFileSync(path, 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to read file: ${path}`, path, asError(error));
    }
  }

  /**
   * Appends content to an existing file
   */
  appendFile(path: string, content: string): void {
    try {
      appendFileSync(path, content);
    } catch (error) {
      throw new FileError(`Failed to append to file: ${path}`, path, asError(error));
    }
  }

  createWriteStream(path: string): NodeJS.WritableStream {
    try {
      this.createDirectory(dirname(path));
      return createWriteStream(path);
    } catch (error) {
      throw new FileError(`Failed to create write stream for: ${path}`, path, asError(error));
    }
  }

  isFile(path: string): boolean {
    try {
      return existsSync(path) && statSync(path).isFile();
    } catch {
      return false;
    }
  }

  ensureDirectory(path: string): void {
    if (!existsSync(path)) {
      this.createDirectory(path);
    }
  }

  /**
   * Removes a file or directory, warning instead of throwing.
   * Used on cleanup paths where a failure must not mask the original error.
   */
  safeRemove(path: string): void {
    try {
      if (existsSync(path)) {
        if (statSync(path).isDirectory()) {
          this.removeDirectory(path, true);
        } else {
          this.removeFile(path);
        }
      }
    } catch (error) {
      this.warn(`Failed to remove ${path}: ${asError(error).message}`);
    }
  }
}
