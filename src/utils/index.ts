/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Column layout for font lists
export { formatColumns, type ColumnLayoutOptions } from './columns.js';

// Logging interface for library code
export { consoleLogger, silentLogger, type Logger } from './logger.js';

// Home directory expansion
export { expandHome, collapseHome } from './paths.js';

// Serialized entry points
export { SessionLock, type LockedTask } from './session-lock.js';
