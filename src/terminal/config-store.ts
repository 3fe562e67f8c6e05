/**
 * Config Store
 *
 * Reads the font settings out of the terminal config file and rewrites
 * single directives in place, then asks the terminal to reload.
 *
 * Every mutation reads the whole file, changes one line and writes the
 * whole file back. A font family is resolved against the font catalog
 * before the file is touched, so an unknown font never modifies it.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import type { Config } from '../config/index.js';
import { FileNotFoundError, FontNotInstalledError, IOError, InvalidArgumentError } from '../errors/index.js';
import { normalizeFontKey } from '../fonts/normalize.js';
import type { FontLookup } from '../fonts/resolver.js';
import { expandHome } from '../utils/paths.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import {
  formatFontSize,
  parseFontSettings,
  rewriteDirective,
  type FontDirective,
  type FontSettings,
} from './directives.js';
import type { Reloader } from './reloader.js';

/**
 * The operations the navigation engine and router need from the store.
 */
export interface FontSettingsStore {
  read(): FontSettings;
  replaceFamily(key: string): string;
  replaceSize(size: number): string;
}

export interface ConfigStoreOptions {
  /** Active setup config; read on every operation */
  getConfig: () => Config;
  /** Resolves normalized keys to display names */
  fonts: Pick<FontLookup, 'resolve'>;
  reloader: Reloader;
  logger?: Logger;
}

export class ConfigStore implements FontSettingsStore {
  private readonly getConfig: () => Config;
  private readonly fonts: Pick<FontLookup, 'resolve'>;
  private readonly reloader: Reloader;
  private readonly logger: Logger;

  constructor(options: ConfigStoreOptions) {
    this.getConfig = options.getConfig;
    this.fonts = options.fonts;
    this.reloader = options.reloader;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Absolute path of the terminal config file
   */
  get path(): string {
    return expandHome(this.getConfig().terminal_config_path);
  }

  /**
   * Read the current font settings. Missing keys yield '' / 'default'.
   *
   * @throws FileNotFoundError if the config file doesn't exist
   * @throws IOError if it can't be read
   */
  read(): FontSettings {
    return parseFontSettings(this.load());
  }

  /**
   * Set the font family.
   *
   * @param key - Font name; whitespace is stripped before lookup
   * @returns The display name written to the file
   * @throws FontNotInstalledError if the font isn't in the catalog
   */
  replaceFamily(key: string): string {
    const normalized = normalizeFontKey(key);
    const family = this.fonts.resolve(normalized);

    if (family === undefined) {
      throw new FontNotInstalledError(key.trim() || key);
    }

    this.rewrite('font_family', family);
    return family;
  }

  /**
   * Set the font size.
   *
   * @returns The size text written to the file
   * @throws InvalidArgumentError if size isn't a positive number
   */
  replaceSize(size: number): string {
    if (!Number.isFinite(size) || size <= 0) {
      throw new InvalidArgumentError(
        `Invalid font size: ${size}`,
        'Font size must be a positive number, e.g. 12 or 13.5'
      );
    }

    const sizeText = formatFontSize(size);
    this.rewrite('font_size', sizeText);
    return sizeText;
  }

  private rewrite(key: FontDirective, value: string): void {
    const path = this.path;
    const result = rewriteDirective(this.load(), key, value);

    try {
      writeFileSync(path, result.content, 'utf-8');
    } catch (error) {
      throw new IOError(
        `Failed to write ${path}`,
        error instanceof Error ? error : undefined
      );
    }

    this.logger.debug?.(
      `${result.appended ? 'Appended' : 'Rewrote'} ${key} on line ${result.line + 1} of ${path}`
    );
    if (result.occurrences > 1) {
      this.logger.warn(
        `${key} appears ${result.occurrences} times in ${path}; only line ${result.line + 1} was changed and the last one still applies`
      );
    }
    this.reloader.reload();
  }

  private load(): string {
    const path = this.path;

    if (!existsSync(path)) {
      throw new FileNotFoundError(path);
    }

    try {
      return readFileSync(path, 'utf-8');
    } catch (error) {
      throw new IOError(
        `Failed to read ${path}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}
