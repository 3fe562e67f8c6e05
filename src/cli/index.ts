#!/usr/bin/env node
/**
 * fontctl CLI Entry Point
 *
 * This is the main entry point for the `fontctl` command.
 * It sets up Commander.js with global options, runs the action given on the
 * command line and, when that action opens a panel, keeps reading keys
 * until the panel is closed.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { FontControlApp } from '../app/index.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';
import { ACTIONS } from '../router/index.js';
import { createCompleteCommand } from './commands/complete.js';
import { createConfigCommand } from './commands/config.js';
import { createContext, resolveCliConfig } from './context.js';
import { runKeySession } from './tui/key-session.js';
import { TerminalPanelHost } from './tui/panel-host.js';
import type { CommandContext, GlobalOptions } from './types.js';

const PackageSchema = z.object({ version: z.string() });

/**
 * Version from package.json (two levels up from both src/cli and dist/cli)
 */
function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
    );
    const result = PackageSchema.safeParse(raw);
    return result.success ? result.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

// Create the root program
const program = new Command();

program
  .name('fontctl')
  .description('Inspect and change the kitty terminal font family and size')
  .version(readVersion(), '-v, --version', 'Display version number')
  .argument('[action]', `One of: ${ACTIONS.join(', ')} (default: open the main menu)`)
  .argument('[argument...]', 'Argument for the action, e.g. a font name or size')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--setup <file>', 'Setup file to use instead of ~/.config/fontctl/config.toml')
  .option('--terminal-config <path>', 'Terminal config file to edit')
  .option('--border <style>', 'Panel border: none, single, double, rounded, solid, shadow')

  // Custom help formatting
  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('fontctl')}                         Open the main menu
  ${chalk.cyan('fontctl check')}                   Show the current font family and size
  ${chalk.cyan('fontctl check "Fira Code"')}       Check a font is installed and usable
  ${chalk.cyan('fontctl set_font FiraCode')}       Set the font family
  ${chalk.cyan('fontctl set_size 13.5')}           Set the font size
  ${chalk.cyan('fontctl size_up')}                 Increase the font size by 0.5
  ${chalk.cyan('fontctl list')}                    List compatible fonts
  ${chalk.cyan('fontctl config list')}             Show the configuration

${chalk.dim('Panel keys:')}
  j/k or arrows move, enter selects, +/- change size,
  escape/backspace go back, q closes
`);

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    setup: opts.setup,
    terminalConfig: opts.terminalConfig,
    border: opts.border,
  };
}

/**
 * Build the application with the resolved config.
 * Throws ConfigError before anything is touched if the config is invalid.
 */
function createApp(ctx: CommandContext, host: TerminalPanelHost = new TerminalPanelHost()): FontControlApp {
  return new FontControlApp({
    host,
    logger: ctx,
    config: resolveCliConfig(ctx.options),
  });
}

// Root action: run one command, then drive any panel it opened
program.action(async (action: string | undefined, args: string[]) => {
  const options = getGlobalOptions();
  const host = new TerminalPanelHost();
  const ctx = createContext(options, host);
  const app = createApp(ctx, host);

  app.dispatch(action ?? '', args.join(' '));
  await runKeySession(app, { logger: ctx });
});

// Config command - show setup options
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// Completion for shell scripts
program.addCommand(
  createCompleteCommand(() => createContext(getGlobalOptions()), (ctx) => createApp(ctx)),
  { hidden: true }
);

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

async function main(): Promise<void> {
  const getErrorOptions = () => ({ verbose: getGlobalOptions().verbose });

  // Set up global error handlers for uncaught exceptions
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
