import { isatty } from 'tty';

// Diagnostics go to stderr, so colour only when stderr is a terminal
const isTTY = isatty(process.stderr.fd) && !process.env.NO_COLOR;

/**
 * Console colors using ANSI escape codes
 * Only applies colors if output is going to a TTY
 */
export const colors = {
  red: (text: string) => isTTY ? `\x1b[31m${text}\x1b[0m` : text,
  green: (text: string) => isTTY ? `\x1b[32m${text}\x1b[0m` : text,
  yellow: (text: string) => isTTY ? `\x1b[33m${text}\x1b[0m` : text,
  blue: (text: string) => isTTY ? `\x1b[34m${text}\x1b[0m` : text,
  cyan: (text: string) => isTTY ? `\x1b[36m${text}\x1b[0m` : text,
  gray: (text: string) => isTTY ? `\x1b[90m${text}\x1b[0m` : text,
};
