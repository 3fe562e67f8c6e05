/**
 * Configuration Schema
 *
 * Defines the shape of ~/.config/fontctl/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Border drawn around overlay panels
 */
export const BorderStyleSchema = z.enum(['none', 'single', 'double', 'rounded', 'solid', 'shadow']);

export type BorderStyle = z.infer<typeof BorderStyleSchema>;

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  border: BorderStyleSchema.describe('Border style for overlay panels'),
  terminal_config_path: z
    .string()
    .min(1)
    .describe('Path to the terminal configuration file (~ is expanded)'),
  terminal_process: z
    .string()
    .min(1)
    .describe('Process name that receives the reload signal'),
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for sparse setup options
 */
export const PartialConfigSchema = ConfigSchema.partial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

/**
 * Older option names still accepted in setup options, mapped to their
 * current key.
 */
export const LEGACY_KEYS: Readonly<Record<string, keyof Config>> = {
  borders: 'border',
  kitty_conf_path: 'terminal_config_path',
};
