/**
 * Config Command
 *
 * Shows the setup options fontctl runs with:
 *   fontctl config list   - Show the resolved configuration
 *   fontctl config path   - Show the setup file location
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { listConfig } from '../../config/index.js';
import { expandHome } from '../../utils/paths.js';
import { resolveCliConfig, resolveSetupPath } from '../context.js';
import type { CommandContext } from '../types.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Show configuration settings');

  // fontctl config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List the resolved configuration values')
    .action(() => {
      const ctx = getContext();
      const config = resolveCliConfig(ctx.options);

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      for (const [key, value] of listConfig(config)) {
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Setup file: ${resolveSetupPath(ctx.options)}`));
      ctx.log(chalk.dim(`Terminal config: ${expandHome(config.terminal_config_path)}`));
    });

  // fontctl config path
  configCmd
    .command('path')
    .description('Show the setup file location')
    .action(() => {
      const ctx = getContext();
      ctx.log(resolveSetupPath(ctx.options));
    });

  return configCmd;
}
