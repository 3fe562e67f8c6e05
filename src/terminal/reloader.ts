/**
 * Terminal Reloader
 *
 * Tells a running terminal to re-read its config file by sending it
 * SIGUSR1 (kitty reloads its config on that signal). The terminal not
 * running is normal: the file change is picked up on next start.
 */

import { execFileSync } from 'node:child_process';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface Reloader {
  /** Signal the terminal; returns how many processes were signalled */
  reload(): number;
}

export interface SignalReloaderOptions {
  /** Process name to look up, read on every reload */
  getProcessName: () => string;
  /** Signal to deliver (default: SIGUSR1) */
  signal?: NodeJS.Signals;
  logger?: Logger;
}

/**
 * Find the pids of running processes with the given name.
 *
 * @returns pids, or [] if none is running or pidof isn't available
 */
export function findProcessIds(processName: string): number[] {
  try {
    const output = execFileSync('pidof', [processName], {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
    });
    return output
      .trim()
      .split(/\s+/)
      .map(Number)
      .filter((pid) => Number.isInteger(pid) && pid > 0);
  } catch {
    // pidof exits 1 when nothing matches
    return [];
  }
}

export class SignalReloader implements Reloader {
  private readonly getProcessName: () => string;
  private readonly signal: NodeJS.Signals;
  private readonly logger: Logger;

  constructor(options: SignalReloaderOptions) {
    this.getProcessName = options.getProcessName;
    this.signal = options.signal ?? 'SIGUSR1';
    this.logger = options.logger ?? silentLogger;
  }

  reload(): number {
    const processName = this.getProcessName();
    const pids = findProcessIds(processName);

    if (pids.length === 0) {
      this.logger.debug?.(`No running ${processName} process, skipped reload`);
      return 0;
    }

    let signalled = 0;
    for (const pid of pids) {
      try {
        process.kill(pid, this.signal);
        signalled++;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Could not signal ${processName} (pid ${pid}): ${message}`);
      }
    }

    this.logger.debug?.(`Sent ${this.signal} to ${signalled} ${processName} process(es)`);
    return signalled;
  }
}
