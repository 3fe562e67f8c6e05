/**
 * Error type definitions for fontctl
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 */

/**
 * Base class for all CLI errors.
 *
 * - hint: Tells the user HOW to fix the problem
 * - code: Allows scripts to handle different errors differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when the terminal configuration file doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Terminal config file does not exist: ${path}`,
      'Set terminal_config_path in ~/.config/fontctl/config.toml or pass --terminal-config',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for setup configuration errors.
 *
 * Examples:
 * - Invalid TOML syntax in the setup file
 * - Unknown border style
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: fontctl config list  to see the active settings',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a requested font family is not in the compatible catalog.
 *
 * Exit code 4: Font error
 */
export class FontNotInstalledError extends CLIError {
  constructor(font: string) {
    super(
      `Font is not installed or not supported by the terminal: ${font}`,
      'Run: fontctl list  to see compatible fonts',
      4
    );
    this.name = 'FontNotInstalledError';
  }
}

/**
 * Wraps file read/write failures on the terminal configuration file.
 *
 * Exit code 5: I/O error
 */
export class IOError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, 'Check that the file is readable and writable', 5);
    this.name = 'IOError';
    this.cause = cause;
  }
}

/**
 * Thrown when a user-supplied or on-disk value can't be used,
 * e.g. a font size that isn't a number.
 *
 * Exit code 1: General error (user input error)
 */
export class InvalidArgumentError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Check your input and try again', 1);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Thrown when the surface host fails to create or destroy a panel.
 *
 * Exit code 6: Host error
 */
export class HostApiError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, 'Make sure fontctl runs in an interactive terminal', 6);
    this.name = 'HostApiError';
    this.cause = cause;
  }
}
