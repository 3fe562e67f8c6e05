/**
 * Global CLI options available to all commands
 * These are parsed at the root level and passed down to subcommands
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose: boolean;
  /** Setup file to read instead of ~/.config/fontctl/config.toml */
  setup?: string;
  /** Terminal config file, overrides terminal_config_path */
  terminalConfig?: string;
  /** Panel border style, overrides border */
  border?: string;
}

/**
 * Context passed to all command handlers
 * Combines parsed options with runtime utilities.
 * Satisfies Logger, so it is handed straight to library code.
 */
export interface CommandContext {
  options: GlobalOptions;
  /** Plain output (command results) */
  log: (message: string) => void;
  /** Informational notice */
  info: (message: string) => void;
  /** Log a warning */
  warn: (message: string) => void;
  /** Log an error message; the process will exit non-zero */
  error: (message: string) => void;
  /** Log a debug message (only shown with --verbose) */
  debug: (message: string) => void;
}
