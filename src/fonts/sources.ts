/**
 * Font Sources
 *
 * The two external font enumerations the catalog is built from:
 * - fontconfig's `fc-list` for fonts installed on the system
 * - kitty's own font map, dumped as JSON through `kitty +runpy`
 *
 * Both run synchronously through execFileSync; they only run when the
 * catalog is first needed.
 */

import { execFileSync } from 'node:child_process';
import { z } from 'zod';

/**
 * Runs an external command and returns its stdout.
 * Throws if the command can't be spawned or exits non-zero.
 */
export type CommandRunner = (file: string, args: readonly string[]) => string;

export interface ExternalCommand {
  file: string;
  args: readonly string[];
}

export const INSTALLED_FONTS_COMMAND: ExternalCommand = {
  file: 'fc-list',
  args: [':', 'family'],
};

export const TERMINAL_FONTS_COMMAND: ExternalCommand = {
  file: 'kitty',
  args: [
    '+runpy',
    'from kitty.fonts.common import all_fonts_map; import json; print(json.dumps(all_fonts_map(True)))',
  ],
};

/**
 * Default runner: execFileSync with stderr discarded.
 */
export const execCommand: CommandRunner = (file, args) =>
  execFileSync(file, [...args], {
    encoding: 'utf8',
    stdio: ['ignore', 'pipe', 'ignore'],
  });

/**
 * Parse `fc-list : family` output.
 *
 * Each line is a comma-separated list of localized family names; only the
 * first is kept. Blank lines are dropped and duplicates removed, keeping
 * first-seen order.
 */
export function parseInstalledFonts(output: string): Set<string> {
  const fonts = new Set<string>();
  for (const line of output.split('\n')) {
    const family = (line.split(',')[0] ?? '').trim();
    if (family) {
      fonts.add(family);
    }
  }
  return fonts;
}

const FontDescriptorSchema = z.object({ family: z.string() });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the terminal's font map JSON.
 *
 * Expected shape: `{ "family_map": { "<key>": [{ "family": "..." }, ...] } }`.
 * A document without `family_map` is read as the family map itself.
 * Anything malformed yields an empty set.
 */
export function parseTerminalFonts(output: string): Set<string> {
  const fonts = new Set<string>();

  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    return fonts;
  }

  if (!isRecord(parsed)) return fonts;
  const familyMap = isRecord(parsed['family_map']) ? parsed['family_map'] : parsed;

  for (const descriptors of Object.values(familyMap)) {
    if (!Array.isArray(descriptors)) continue;
    for (const descriptor of descriptors) {
      const result = FontDescriptorSchema.safeParse(descriptor);
      if (result.success && result.data.family) {
        fonts.add(result.data.family);
      }
    }
  }

  return fonts;
}
