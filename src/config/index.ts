/**
 * Config Module
 *
 * Setup options for fontctl. CLI users interact via `fontctl config`.
 */

// Schema and types
export { ConfigSchema, PartialConfigSchema, BorderStyleSchema, LEGACY_KEYS } from './schema.js';
export type { Config, PartialConfig, BorderStyle } from './schema.js';

// Defaults
export { DEFAULT_CONFIG } from './defaults.js';

// Loader functions
export { loadConfig, resolveSetupOptions, listConfig } from './loader.js';

// Paths
export { FONTCTL_DIR, SETUP_PATH, getFontctlDir, getSetupPath } from './paths.js';
