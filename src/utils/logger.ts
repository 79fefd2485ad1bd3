/**
 * Console logger for gostrap
 *
 * Everything goes to stderr so stdout stays clean for scripts. Prefixes are
 * stable (`[>]`, `[WARN]:`, `[ERROR]:`) whether or not colours are enabled.
 */

import type { ILogger, LogLevel } from '../interfaces.js';
import { colors } from './colors.js';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export class ConsoleLogger implements ILogger {
  private readonly level: LogLevel;
  private readonly write: (line: string) => void;

  constructor(level: LogLevel = 'info', write: (line: string) => void = (line) => process.stderr.write(`${line}\n`)) {
    this.level = level;
    this.write = write;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string): void {
    if (this.enabled('debug')) this.write(colors.gray(`[debug] ${message}`));
  }

  info(message: string): void {
    if (this.enabled('info')) this.write(`${colors.cyan('[>]')} ${message}`);
  }

  success(message: string): void {
    if (this.enabled('info')) this.write(`${colors.green('[✓]')} ${message}`);
  }

  warn(message: string): void {
    if (this.enabled('warn')) this.write(colors.yellow(`[WARN]: ${message}`));
  }

  error(message: string): void {
    this.write(colors.red(`[ERROR]: ${message}`));
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }
}
