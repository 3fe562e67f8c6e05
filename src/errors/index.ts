/**
 * Error handling module for fontctl
 *
 * Usage:
 *   import { FontNotInstalledError, handleError } from './errors/index.js';
 *
 *   throw new FontNotInstalledError('FiraCode');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  FontNotInstalledError,
  IOError,
  InvalidArgumentError,
  HostApiError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  describeError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
} from './handler.js';
