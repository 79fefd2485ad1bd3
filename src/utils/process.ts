/**
 * External process helpers: command execution, privilege probing and
 * process lifecycle hooks
 */

import { spawnSync } from 'child_process';
import which from 'which';
import type { ICommandRunner, IPrivilegeProbe, IProcessHooks, Unsubscribe } from '../interfaces.js';
import type { CommandOptions, CommandResult } from '../types.js';

export class SpawnCommandRunner implements ICommandRunner {
  run(command: string, args: string[], options: CommandOptions = {}): CommandResult {
    const result = spawnSync(command, args, {
      encoding: 'utf-8',
      stdio: options.interactive ? 'inherit' : 'pipe',
    });

    return {
      exitCode: result.status ?? 1,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      error: result.error,
    };
  }

  exists(command: string): boolean {
    return which.sync(command, { nothrow: true }) !== null;
  }
}

/**
 * Checks for root, or asks sudo to validate (and cache) credentials
 */
export class SudoPrivilegeProbe implements IPrivilegeProbe {
  constructor(private commandRunner: ICommandRunner) {}

  isElevated(): boolean {
    return process.getuid?.() === 0;
  }

  canElevate(): boolean {
    if (this.isElevated()) {
      return true;
    }
    const result = this.commandRunner.run('sudo', ['-v'], { interactive: true });
    return !result.error && result.exitCode === 0;
  }
}

// SIGHUP's default action would end the process without firing 'exit'
const TERMINATION_SIGNALS: NodeJS.Signals[] = ['SIGHUP', 'SIGINT', 'SIGTERM'];

export class NodeProcessHooks implements IProcessHooks {
  onExit(handler: () => void): Unsubscribe {
    process.on('exit', handler);
    return () => {
      process.off('exit', handler);
    };
  }

  onSignal(handler: (signal: NodeJS.Signals) => void): Unsubscribe {
    for (const signal of TERMINATION_SIGNALS) {
      process.on(signal, handler);
    }
    return () => {
      for (const signal of TERMINATION_SIGNALS) {
        process.off(signal, handler);
      }
    };
  }
}

/**
 * Conventional shell exit status for a terminating signal
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  switch (signal) {
    case 'SIGHUP': return 129;
    case 'SIGINT': return 130;
    case 'SIGTERM': return 143;
    default: return 1;
  }
}
