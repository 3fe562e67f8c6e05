/**
 * Router Module
 *
 * Command parsing, routing and completion.
 */

export { CommandRouter } from './command-router.js';
export type { CommandRouterOptions } from './command-router.js';
export { ACTIONS, isAction, parseCommand } from './commands.js';
export type { Action, Command } from './commands.js';
export { completeCommandLine } from './completion.js';
