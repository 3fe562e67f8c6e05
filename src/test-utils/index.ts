/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { FakeSurfaceHost, RecordingLogger } from '../../test-utils/index.js';
 *
 * const host = new FakeSurfaceHost();
 * const logger = new RecordingLogger();
 * ```
 */

export { FakeSurfaceHost } from './surface.js';
export type { FakePanel, FakeSurfaceHostOptions } from './surface.js';
export { RecordingLogger } from './logger.js';
export type { LogEntry, LogLevel } from './logger.js';
export { createTempTerminalConfig, fakeFontCommands } from './fixtures.js';
export type { TempTerminalConfig } from './fixtures.js';
