/**
 * Tests for error handling system
 *
 * Tests cover:
 * - Error class instantiation and properties
 * - Error formatting and one-line descriptions
 * - Exit code extraction
 * - Verbose mode (stack traces)
 */

import { describe, it, expect } from 'vitest';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  FontNotInstalledError,
  IOError,
  InvalidArgumentError,
  HostApiError,
  formatError,
  describeError,
  getExitCode,
} from '../index.js';

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('creates error with custom exit code', () => {
      const error = new CLIError('Critical failure', 'Reboot', 99);

      expect(error.hint).toBe('Reboot');
      expect(error.code).toBe(99);
    });

    it('is instanceof Error', () => {
      const error = new CLIError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('FileNotFoundError', () => {
    it('names the missing path', () => {
      const error = new FileNotFoundError('/home/me/.config/kitty/kitty.conf');

      expect(error.message).toBe('Terminal config file does not exist: /home/me/.config/kitty/kitty.conf');
      expect(error.code).toBe(3);
      expect(error.name).toBe('FileNotFoundError');
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('ConfigError', () => {
    it('has a default hint and exit code 2', () => {
      const error = new ConfigError('Invalid TOML');

      expect(error.hint).toBe('Run: fontctl config list  to see the active settings');
      expect(error.code).toBe(2);
    });

    it('accepts a custom hint', () => {
      expect(new ConfigError('Bad', 'Fix it').hint).toBe('Fix it');
    });
  });

  describe('FontNotInstalledError', () => {
    it('names the font', () => {
      const error = new FontNotInstalledError('Helvetica');

      expect(error.message).toBe('Font is not installed or not supported by the terminal: Helvetica');
      expect(error.hint).toBe('Run: fontctl list  to see compatible fonts');
      expect(error.code).toBe(4);
    });
  });

  describe('IOError', () => {
    it('keeps the cause', () => {
      const cause = new Error('EACCES: permission denied');
      const error = new IOError('Failed to write /tmp/kitty.conf', cause);

      expect(error.cause).toBe(cause);
      expect(error.code).toBe(5);
      expect(error.name).toBe('IOError');
    });
  });

  describe('InvalidArgumentError', () => {
    it('defaults to a generic hint', () => {
      const error = new InvalidArgumentError('Invalid font size: abc');

      expect(error.hint).toBe('Check your input and try again');
      expect(error.code).toBe(1);
    });
  });

  describe('HostApiError', () => {
    it('has exit code 6', () => {
      const error = new HostApiError('Could not open panel: no tty');

      expect(error.code).toBe(6);
      expect(error).toBeInstanceOf(CLIError);
    });
  });
});

describe('formatError', () => {
  it('includes message and hint for CLIError', () => {
    const output = formatError(new FontNotInstalledError('Helvetica'));

    expect(output).toContain('Error: ');
    expect(output).toContain('Font is not installed or not supported by the terminal: Helvetica');
    expect(output).toContain('Hint: ');
    expect(output).toContain('Run: fontctl list  to see compatible fonts');
  });

  it('suggests --verbose for plain errors', () => {
    const output = formatError(new Error('boom'));

    expect(output).toContain('boom');
    expect(output).toContain('Run with --verbose for more details');
  });

  it('includes the stack trace in verbose mode', () => {
    const output = formatError(new CLIError('boom'), { verbose: true });

    expect(output).toContain('Stack trace:');
  });

  it('handles non-Error values', () => {
    expect(formatError('string error')).toContain('string error');
  });
});

describe('describeError', () => {
  it('returns the message of an Error', () => {
    expect(describeError(new InvalidArgumentError('Invalid font size: abc'))).toBe('Invalid font size: abc');
  });

  it('keeps only the first line', () => {
    const error = new ConfigError('Invalid configuration:\n  - border: Invalid enum value');

    expect(describeError(error)).toBe('Invalid configuration:');
  });

  it('stringifies non-Error values', () => {
    expect(describeError(42)).toBe('42');
  });
});

describe('getExitCode', () => {
  it('returns the code of a CLIError', () => {
    expect(getExitCode(new FontNotInstalledError('X'))).toBe(4);
    expect(getExitCode(new FileNotFoundError('/x'))).toBe(3);
  });

  it('returns 1 for other errors', () => {
    expect(getExitCode(new Error('x'))).toBe(1);
    expect(getExitCode('x')).toBe(1);
  });
});
