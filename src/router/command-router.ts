/**
 * Command Router
 *
 * Single entry point for commands: turns an action + argument into either
 * a navigation transition or a direct config change, and reports the
 * outcome as notices. Errors are left to propagate to the caller.
 */

import { InvalidArgumentError } from '../errors/index.js';
import { normalizeFontKey } from '../fonts/normalize.js';
import type { FontLookup } from '../fonts/resolver.js';
import type { NavigationEngine } from '../navigation/engine.js';
import { PanelKind } from '../navigation/types.js';
import type { FontSettingsStore } from '../terminal/config-store.js';
import { parseSizeText } from '../terminal/directives.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { parseCommand, type Command } from './commands.js';

export interface CommandRouterOptions {
  engine: NavigationEngine;
  store: FontSettingsStore;
  fonts: Pick<FontLookup, 'resolve' | 'displayNames'>;
  logger?: Logger;
}

export class CommandRouter {
  private readonly engine: NavigationEngine;
  private readonly store: FontSettingsStore;
  private readonly fonts: Pick<FontLookup, 'resolve' | 'displayNames'>;
  private readonly logger: Logger;

  constructor(options: CommandRouterOptions) {
    this.engine = options.engine;
    this.store = options.store;
    this.fonts = options.fonts;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Parse and execute. An unknown action is reported and changes nothing.
   */
  route(action: string, argument?: string): void {
    const command = parseCommand(action, argument);

    if (!command) {
      this.logger.warn(`Unknown command: ${action.trim()}`);
      return;
    }

    this.execute(command);
  }

  execute(command: Command): void {
    switch (command.type) {
      case 'main-menu':
        this.engine.open(PanelKind.MAIN_MENU);
        return;

      case 'check':
        if (command.font === undefined) {
          this.printCurrentFont();
        } else {
          this.checkFont(command.font);
        }
        return;

      case 'show-info':
        this.engine.open(PanelKind.FONT_INFO);
        return;

      case 'set-family':
        if (command.family === undefined) {
          this.engine.open(PanelKind.FAMILY_PICKER);
        } else {
          const family = this.store.replaceFamily(command.family);
          this.logger.info(`Font family set to ${family}`);
        }
        return;

      case 'set-size':
        if (command.size === undefined) {
          this.engine.open(PanelKind.SIZE_CONTROL);
        } else {
          this.setSize(command.size);
        }
        return;

      case 'list':
        this.printFontList();
        return;

      case 'show-list':
        this.engine.open(PanelKind.FONT_LIST);
        return;

      case 'close':
        this.engine.close();
        return;

      case 'size-up':
      case 'size-down': {
        const size = this.engine.adjustSize(command.type === 'size-up' ? 1 : -1);
        this.logger.info(`Font size set to ${size}`);
        return;
      }
    }
  }

  private printCurrentFont(): void {
    const { family, sizeText } = this.store.read();
    this.logger.info(`Font family: ${family || '(not set)'}`);
    this.logger.info(`Font size: ${sizeText}`);
  }

  private checkFont(font: string): void {
    const family = this.fonts.resolve(normalizeFontKey(font));

    if (family === undefined) {
      this.logger.warn(`${font} is NOT installed or not supported by the terminal`);
    } else {
      this.logger.info(`${family} is installed and supported by the terminal`);
    }
  }

  private setSize(text: string): void {
    const size = parseSizeText(text);

    if (size === undefined) {
      throw new InvalidArgumentError(
        `Invalid font size: ${text}`,
        'Font size must be a number, e.g. 12 or 13.5'
      );
    }

    const sizeText = this.store.replaceSize(size);
    this.logger.info(`Font size set to ${sizeText}`);
  }

  private printFontList(): void {
    const names = this.fonts.displayNames();

    if (names.length === 0) {
      this.logger.warn('No compatible fonts found');
      return;
    }

    this.logger.info('Available fonts:');
    for (const name of names) {
      this.logger.info(`  - ${name}`);
    }
  }
}
