/**
 * Default Configuration Values
 *
 * Used when no setup file exists, and for every key a setup file or
 * setup options bag leaves out.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  border: 'single',
  terminal_config_path: '~/.config/kitty/kitty.conf',
  terminal_process: 'kitty',
};
