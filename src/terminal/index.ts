/**
 * Terminal Module
 *
 * Reading and rewriting the terminal config file, and reload signalling.
 */

export { ConfigStore } from './config-store.js';
export type { ConfigStoreOptions, FontSettingsStore } from './config-store.js';
export { SignalReloader, findProcessIds } from './reloader.js';
export type { Reloader, SignalReloaderOptions } from './reloader.js';
export {
  DEFAULT_SIZE_TEXT,
  parseFontSettings,
  parseSizeText,
  formatFontSize,
  rewriteDirective,
} from './directives.js';
export type { FontSettings, FontDirective, DirectiveRewrite } from './directives.js';
