/**
 * Command context and config resolution for the CLI.
 */

import chalk from 'chalk';
import {
  getSetupPath,
  loadConfig,
  resolveSetupOptions,
  type Config,
} from '../config/index.js';
import type { CommandContext, GlobalOptions } from './types.js';

/**
 * Where notices go while a panel covers the screen.
 */
export interface NoticeSink {
  readonly isActive: boolean;
  showNotice(message: string): void;
}

/**
 * Create a command context with logging utilities.
 *
 * While `notices` is active (a panel is on screen), notices are drawn by it
 * instead of being printed under the panel.
 */
export function createContext(options: GlobalOptions, notices?: NoticeSink): CommandContext {
  const print = (message: string, write: (text: string) => void, plain: string = message): void => {
    if (notices?.isActive) {
      notices.showNotice(plain);
    } else {
      write(message);
    }
  };

  return {
    options,
    log: (message: string) => console.log(message),
    info: (message: string) => print(message, console.log),
    warn: (message: string) =>
      print(chalk.yellow(`Warning: ${message}`), console.warn, `Warning: ${message}`),
    error: (message: string) => {
      process.exitCode = 1;
      print(chalk.red(`Error: ${message}`), console.error, `Error: ${message}`);
    },
    debug: (message: string) => {
      if (options.verbose) {
        print(chalk.dim(`[debug] ${message}`), console.log, `[debug] ${message}`);
      }
    },
  };
}

/**
 * Setup file named by --setup, or the default location.
 */
export function resolveSetupPath(options: GlobalOptions): string {
  return options.setup ?? getSetupPath();
}

/**
 * Load the setup file and apply command-line overrides.
 *
 * @throws ConfigError on an invalid file or override
 */
export function resolveCliConfig(options: GlobalOptions): Config {
  const fromFile = loadConfig(resolveSetupPath(options));

  return resolveSetupOptions(
    {
      terminal_config_path: options.terminalConfig,
      border: options.border,
    },
    fromFile
  );
}
