/**
 * Fonts Module
 *
 * Compatible font discovery and the memoized font catalog.
 */

export { FontResolver, buildCatalog } from './resolver.js';
export type { FontCatalog, FontLookup, FontResolverOptions } from './resolver.js';
export { MemoCache } from './cache.js';
export { normalizeFontKey } from './normalize.js';
export {
  execCommand,
  parseInstalledFonts,
  parseTerminalFonts,
  INSTALLED_FONTS_COMMAND,
  TERMINAL_FONTS_COMMAND,
} from './sources.js';
export type { CommandRunner, ExternalCommand } from './sources.js';
