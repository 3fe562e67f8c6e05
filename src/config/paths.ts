/**
 * Centralized Path Definitions
 *
 * ~/.config/fontctl/
 * └── config.toml     (setup options)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const FONTCTL_DIR = join(homedir(), '.config', 'fontctl');
export const SETUP_PATH = join(FONTCTL_DIR, 'config.toml');

/**
 * Get the fontctl directory path (~/.config/fontctl)
 */
export function getFontctlDir(): string {
  return FONTCTL_DIR;
}

/**
 * Get the setup file path (~/.config/fontctl/config.toml)
 */
export function getSetupPath(): string {
  return SETUP_PATH;
}
