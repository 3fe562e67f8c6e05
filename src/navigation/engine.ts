/**
 * Navigation Engine
 *
 * State machine over overlay panels. At most one panel is live; its
 * surface handle is held from the moment the panel opens until it closes,
 * and released on every path out (close, back, replacing the menu with the
 * chosen panel).
 *
 * ```
 *            open(kind)
 *   closed ─────────────> main-menu | family-picker | size-control
 *     ^                   | font-info | font-list
 *     └───── close() / quit ────┘
 * ```
 *
 * Back (escape/backspace outside the main menu) is close + open(main-menu)
 * as one action.
 */

import type { Config } from '../config/index.js';
import { CLIError, HostApiError, InvalidArgumentError } from '../errors/index.js';
import { normalizeFontKey } from '../fonts/normalize.js';
import type { FontLookup } from '../fonts/resolver.js';
import type { FontSettingsStore } from '../terminal/config-store.js';
import { formatFontSize, parseSizeText } from '../terminal/directives.js';
import { formatColumns } from '../utils/columns.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { centerPanel, contentWidth, listWidth } from './layout.js';
import type { SurfaceHandle, SurfaceHost } from './surface.js';
import {
  MAIN_MENU_ITEMS,
  PanelKind,
  type CursorPanel,
  type FamilyPickerPanel,
  type FontListPanel,
  type MainMenuPanel,
  type NavigationState,
  type Panel,
  type PanelKey,
} from './types.js';

/** Font size change per increment/decrement */
export const SIZE_STEP = 0.5;

/** Visible rows in the family picker */
export const FAMILY_PICKER_HEIGHT = 10;

export interface NavigationEngineOptions {
  host: SurfaceHost;
  store: FontSettingsStore;
  fonts: Pick<FontLookup, 'displayNames'>;
  /** Active setup config (border style) */
  getConfig: () => Config;
  logger?: Logger;
}

/**
 * Lines shown by the size control
 */
export function sizeLines(size: number): string[] {
  return ['', `Current size: [ ${formatFontSize(size)} ]`, ''];
}

export class NavigationEngine {
  private readonly host: SurfaceHost;
  private readonly store: FontSettingsStore;
  private readonly fonts: Pick<FontLookup, 'displayNames'>;
  private readonly getConfig: () => Config;
  private readonly logger: Logger;
  private panel: Panel | null = null;

  constructor(options: NavigationEngineOptions) {
    this.host = options.host;
    this.store = options.store;
    this.fonts = options.fonts;
    this.getConfig = options.getConfig;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): NavigationState {
    return this.panel?.kind ?? 'closed';
  }

  /** The live panel, or null when closed */
  get current(): Readonly<Panel> | null {
    return this.panel;
  }

  /**
   * Open a panel from the closed state.
   *
   * @returns false (with a notice) if a panel is already open
   * @throws if the panel's content can't be produced; nothing is opened
   */
  open(kind: PanelKind): boolean {
    if (this.panel) {
      this.logger.info('Panel is already open');
      return false;
    }

    this.panel = this.build(kind);
    this.logger.debug?.(`Opened ${kind} panel`);
    return true;
  }

  /**
   * Close the live panel.
   *
   * @returns false (with a notice) if no panel is open
   */
  close(): boolean {
    if (!this.panel) {
      this.logger.info('Panel is already closed');
      return false;
    }

    this.release();
    return true;
  }

  /**
   * Close whatever is open and show the main menu.
   */
  back(): void {
    this.release();
    this.open(PanelKind.MAIN_MENU);
  }

  /**
   * Release the live panel, if any, without a notice.
   */
  reset(): void {
    this.release();
  }

  /**
   * Deliver a key to the live panel. Keys arriving while closed are ignored.
   */
  handleKey(key: PanelKey): void {
    const panel = this.panel;
    if (!panel) return;

    if (key === 'quit') {
      this.close();
      return;
    }

    switch (panel.kind) {
      case PanelKind.MAIN_MENU:
        this.handleMenuKey(panel, key);
        return;
      case PanelKind.FAMILY_PICKER:
        this.handlePickerKey(panel, key);
        return;
      case PanelKind.SIZE_CONTROL:
        this.handleSizeKey(key);
        return;
      case PanelKind.FONT_LIST:
        this.handleListKey(panel, key);
        return;
      case PanelKind.FONT_INFO:
        if (key === 'escape' || key === 'backspace') {
          this.back();
        }
        return;
    }
  }

  /**
   * Step the font size up or down by SIZE_STEP. Starts from the size shown
   * by the size control when it is open, otherwise from the terminal
   * config. Refreshes the size control if it is open.
   *
   * @returns The new size
   */
  adjustSize(direction: 1 | -1): number {
    const live = this.panel;
    const current = live?.kind === PanelKind.SIZE_CONTROL ? live.size : this.readSize();
    const next = current + direction * SIZE_STEP;

    if (next <= 0) {
      throw new InvalidArgumentError(
        `Font size cannot go below ${formatFontSize(current)}`,
        'Font size must stay a positive number'
      );
    }

    this.store.replaceSize(next);

    const panel = this.panel;
    if (panel?.kind === PanelKind.SIZE_CONTROL) {
      panel.size = next;
      panel.handle.setLines(sizeLines(next));
    }

    return next;
  }

  // ==========================================================================
  // Key handling
  // ==========================================================================

  private handleMenuKey(panel: MainMenuPanel, key: PanelKey): void {
    switch (key) {
      case 'up':
        this.moveCursor(panel, -1);
        break;
      case 'down':
        this.moveCursor(panel, 1);
        break;
      case 'enter': {
        const item = panel.items[panel.cursor];
        if (item) {
          this.release();
          this.open(item.target);
        }
        break;
      }
      case 'escape':
        this.close();
        break;
    }
  }

  private handlePickerKey(panel: FamilyPickerPanel, key: PanelKey): void {
    switch (key) {
      case 'up':
        this.moveCursor(panel, -1);
        break;
      case 'down':
        this.moveCursor(panel, 1);
        break;
      case 'enter': {
        const name = panel.items[panel.cursor];
        if (name !== undefined) {
          const family = this.store.replaceFamily(normalizeFontKey(name));
          this.logger.info(`Font family set to ${family}`);
        }
        break;
      }
      case 'escape':
      case 'backspace':
        this.back();
        break;
    }
  }

  private handleSizeKey(key: PanelKey): void {
    switch (key) {
      case 'up':
      case 'increment':
        this.adjustSize(1);
        break;
      case 'down':
      case 'decrement':
        this.adjustSize(-1);
        break;
      case 'escape':
      case 'backspace':
        this.back();
        break;
    }
  }

  private handleListKey(panel: FontListPanel, key: PanelKey): void {
    switch (key) {
      case 'up':
        this.scrollList(panel, -1);
        break;
      case 'down':
        this.scrollList(panel, 1);
        break;
      case 'escape':
      case 'backspace':
        this.back();
        break;
    }
  }

  private scrollList(panel: FontListPanel, delta: number): void {
    const last = Math.max(0, panel.text.length - panel.visibleRows);
    const next = Math.min(last, Math.max(0, panel.scroll + delta));
    if (next === panel.scroll) return;

    panel.scroll = next;
    panel.handle.scrollTo(next);
  }

  private moveCursor(panel: CursorPanel, delta: number): void {
    const last = panel.items.length - 1;
    const next = Math.min(last, Math.max(0, panel.cursor + delta));
    if (next === panel.cursor) return;

    panel.cursor = next;
    panel.handle.setCursor(next);
  }

  // ==========================================================================
  // Panel construction
  // ==========================================================================

  private build(kind: PanelKind): Panel {
    switch (kind) {
      case PanelKind.MAIN_MENU: {
        const lines = MAIN_MENU_ITEMS.map((item) => item.label);
        const handle = this.mount(' fontctl ', lines, contentWidth(lines), lines.length, 0);
        return { kind, handle, items: MAIN_MENU_ITEMS, cursor: 0 };
      }

      case PanelKind.FAMILY_PICKER: {
        const items = this.fonts.displayNames();
        if (items.length === 0) {
          throw new CLIError(
            'No compatible fonts found',
            'Check that fontconfig (fc-list) and the terminal are installed'
          );
        }

        // Exact match against the display name; no match leaves the cursor on top
        const { family } = this.store.read();
        const cursor = Math.max(0, items.indexOf(family));
        const height = Math.min(FAMILY_PICKER_HEIGHT, items.length);
        const handle = this.mount(' Choose font family ', items, contentWidth(items, 30), height, cursor);
        return { kind, handle, items, cursor };
      }

      case PanelKind.SIZE_CONTROL: {
        const size = this.readSize();
        const handle = this.mount(' Change font size ', sizeLines(size), 25, 3);
        return { kind, handle, size };
      }

      case PanelKind.FONT_INFO: {
        const { family, sizeText } = this.store.read();
        const text = [`Family: ${family || '(not set)'}`, `Size:   ${sizeText}`];
        const handle = this.mount(' Current font info ', text, contentWidth(text), text.length);
        return { kind, handle, text };
      }

      case PanelKind.FONT_LIST: {
        const names = this.fonts.displayNames();
        const text =
          names.length > 0
            ? formatColumns(names, listWidth(this.host.viewport()))
            : ['No compatible fonts found'];
        const width = contentWidth(text);
        const visibleRows = centerPanel(this.host.viewport(), width, text.length).height;
        const handle = this.mount(' Available fonts ', text, width, text.length);
        return { kind, handle, text, scroll: 0, visibleRows };
      }
    }
  }

  /**
   * Current font size from the terminal config.
   *
   * @throws InvalidArgumentError when the file has no numeric size
   */
  private readSize(): number {
    const { sizeText } = this.store.read();
    const size = parseSizeText(sizeText);

    if (size === undefined) {
      throw new InvalidArgumentError(
        `Font size in the terminal config is not a number: ${sizeText}`,
        'Set one first, e.g.: fontctl set_size 12'
      );
    }

    return size;
  }

  private mount(
    title: string,
    lines: readonly string[],
    width: number,
    height: number,
    cursor?: number
  ): SurfaceHandle {
    const placement = centerPanel(this.host.viewport(), width, height);

    try {
      return this.host.createPanel({
        ...placement,
        title,
        border: this.getConfig().border,
        lines,
        cursor,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HostApiError(
        `Could not open panel: ${message}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  private release(): void {
    const panel = this.panel;
    if (!panel) return;

    // Closed even if destroy throws
    this.panel = null;

    try {
      panel.handle.destroy();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HostApiError(
        `Could not close panel: ${message}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}
