/**
 * Complete Command
 *
 * Prints completion candidates for a partially typed command line, one
 * per line, for shell completion scripts:
 *   fontctl __complete set_font Fi     ->  FiraCode ...
 *   fontctl __complete set_font ""     ->  every compatible font key
 */

import { Command } from 'commander';
import type { FontControlApp } from '../../app/index.js';
import type { CommandContext } from '../types.js';

export function createCompleteCommand(
  getContext: () => CommandContext,
  createApp: (ctx: CommandContext) => FontControlApp
): Command {
  return new Command('__complete')
    .description('Print completion candidates for a command line')
    .argument('[words...]', 'Words typed so far; an empty last word starts a new one')
    .action((words: string[]) => {
      const ctx = getContext();
      const app = createApp(ctx);

      for (const candidate of app.complete(words.join(' '))) {
        ctx.log(candidate);
      }
    });
}
