/**
 * Configuration Loader
 *
 * Handles setup intake:
 * 1. Load config.toml if it exists
 * 2. Map legacy option names
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { PartialConfigSchema, LEGACY_KEYS, type Config } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { getSetupPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build a Config from a key-value options bag.
 *
 * Keys that are absent (or undefined) keep the value from `base`.
 * Unknown keys are ignored.
 *
 * @throws ConfigError if the bag isn't an object or a value is invalid
 */
export function resolveSetupOptions(options: unknown, base: Config = DEFAULT_CONFIG): Config {
  if (options === undefined || options === null) {
    return { ...base };
  }

  if (!isRecord(options)) {
    throw new ConfigError('Setup options must be a key-value table');
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(options)) {
    const target = LEGACY_KEYS[key] ?? key;
    // Current names win over legacy aliases
    if (target !== key && target in options) continue;
    normalized[target] = value;
  }

  const validationResult = PartialConfigSchema.safeParse(normalized);

  if (!validationResult.success) {
    const issues = validationResult.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  const user = validationResult.data;
  return {
    border: user.border ?? base.border,
    terminal_config_path: user.terminal_config_path ?? base.terminal_config_path,
    terminal_process: user.terminal_process ?? base.terminal_process,
  };
}

/**
 * Load and parse the setup file.
 * Returns the merged config (defaults + user overrides)
 *
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(setupPath: string = getSetupPath()): Config {
  if (!fs.existsSync(setupPath)) {
    return { ...DEFAULT_CONFIG };
  }

  let content: string;
  try {
    content = fs.readFileSync(setupPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown read error';
    throw new ConfigError(
      `Cannot read config file: ${message}`,
      `Check that ${setupPath} is a readable file`
    );
  }

  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${setupPath}`
    );
  }

  return resolveSetupOptions(parsed);
}

/**
 * List all config values in a flat format
 * Returns entries like ['border', 'single']
 */
export function listConfig(config: Config): Array<[string, string]> {
  return Object.entries(config).map(([key, value]) => [key, String(value)]);
}
