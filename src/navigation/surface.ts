/**
 * Surface Contract
 *
 * The host owns overlay rendering. The navigation engine asks it for a
 * panel, gets back a handle, and uses the handle to update text and the
 * highlighted line until it destroys it. The CLI implements this with ANSI
 * escape sequences; tests use an in-memory host.
 */

import type { BorderStyle } from '../config/index.js';

/**
 * Where a panel's content area sits. Coordinates are 0-based; the border,
 * when there is one, is drawn around this area.
 */
export interface PanelPlacement {
  row: number;
  col: number;
  width: number;
  height: number;
}

/**
 * Everything the host needs to draw a panel.
 */
export interface PanelSpec extends PanelPlacement {
  title: string;
  border: BorderStyle;
  lines: readonly string[];
  /** Highlighted line, if the panel has a cursor */
  cursor?: number;
}

/**
 * Terminal-sized area the host can draw in.
 */
export interface Viewport {
  rows: number;
  cols: number;
}

/**
 * A live panel. Valid until destroy() is called.
 */
export interface SurfaceHandle {
  setLines(lines: readonly string[]): void;
  setCursor(index: number | undefined): void;
  /** Make `top` the first visible line of a panel taller than its area */
  scrollTo(top: number): void;
  destroy(): void;
}

export interface SurfaceHost {
  viewport(): Viewport;
  createPanel(spec: PanelSpec): SurfaceHandle;
}
