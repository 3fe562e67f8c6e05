/**
 * Temporary terminal config files and canned font command output.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, type Config } from '../config/index.js';
import type { CommandRunner } from '../fonts/sources.js';

export interface TempTerminalConfig {
  dir: string;
  path: string;
  config: Config;
  cleanup(): void;
}

/**
 * Write `content` to a kitty.conf in a fresh temp directory.
 */
export function createTempTerminalConfig(content: string): TempTerminalConfig {
  const dir = mkdtempSync(join(tmpdir(), 'fontctl-test-'));
  const path = join(dir, 'kitty.conf');
  writeFileSync(path, content, 'utf-8');

  return {
    dir,
    path,
    config: { ...DEFAULT_CONFIG, terminal_config_path: path },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/**
 * A command runner answering the two font queries from fixed lists.
 */
export function fakeFontCommands(installed: readonly string[], terminal: readonly string[]): CommandRunner {
  return (file) => {
    if (file === 'fc-list') {
      return installed.map((name) => `${name}\n`).join('');
    }
    if (file === 'kitty') {
      return JSON.stringify({
        family_map: Object.fromEntries(
          terminal.map((family) => [family.toLowerCase(), [{ family }]])
        ),
      });
    }
    throw new Error(`unexpected command: ${file}`);
  };
}
