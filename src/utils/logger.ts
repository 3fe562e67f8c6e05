/**
 * Logger Interface for Library Code
 *
 * A generic logging interface that library code accepts via dependency
 * injection. The CLI passes its CommandContext (which satisfies Logger),
 * tests pass recording or silent loggers.
 *
 * Notices from the navigation engine and command router ("Font size set
 * to 12.5", "Panel is already open") travel through the same channels.
 */

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** User-visible informational notice */
  info: (message: string) => void;
  /** User-visible warning */
  warn: (message: string) => void;
  /** User-visible error notice (one line) */
  error: (message: string) => void;
  /** Debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(message),
  warn: (message: string) => console.warn(message),
  error: (message: string) => console.error(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
