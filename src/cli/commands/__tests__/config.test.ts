/**
 * Tests for config command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createConfigCommand } from '../config.js';
import type { CommandContext } from '../../types.js';
import { stripAnsi } from '../../tui/ansi.js';

describe('createConfigCommand', () => {
  let testDir: string;
  let setupPath: string;
  let mockContext: CommandContext;
  let logOutput: string[];

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fontctl-config-cmd-'));
    setupPath = path.join(testDir, 'config.toml');
    logOutput = [];
    mockContext = {
      options: { verbose: false, setup: setupPath },
      log: (msg: string) => logOutput.push(stripAnsi(msg)),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  const run = async (...args: string[]): Promise<void> => {
    const program = new Command();
    program.addCommand(createConfigCommand(() => mockContext));
    await program.parseAsync(['node', 'test', 'config', ...args]);
  };

  describe('command structure', () => {
    it('creates command with correct name', () => {
      expect(createConfigCommand(() => mockContext).name()).toBe('config');
    });

    it('has ls alias for list', () => {
      const list = createConfigCommand(() => mockContext).commands.find((cmd) => cmd.name() === 'list');
      expect(list?.aliases()).toContain('ls');
    });
  });

  describe('list', () => {
    it('prints the resolved values', async () => {
      fs.writeFileSync(setupPath, 'border = "rounded"\nterminal_config_path = "/etc/kitty.conf"\n');

      await run('list');

      expect(logOutput).toEqual([
        'Configuration:',
        '',
        '  border = rounded',
        '  terminal_config_path = /etc/kitty.conf',
        '  terminal_process = kitty',
        '',
        `Setup file: ${setupPath}`,
        'Terminal config: /etc/kitty.conf',
      ]);
    });
  });

  describe('path', () => {
    it('prints the setup file location', async () => {
      await run('path');

      expect(logOutput).toEqual([setupPath]);
    });
  });
});
