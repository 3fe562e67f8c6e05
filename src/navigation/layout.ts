/**
 * Panel Layout
 *
 * Sizing and centring of panels inside the host viewport.
 */

import type { PanelPlacement, Viewport } from './surface.js';

/** Border rows/columns on each side of the content area */
const BORDER = 1;

/** Horizontal padding added to the widest line */
const PADDING = 4;

/**
 * Width that fits the widest line plus padding, never below `min`.
 */
export function contentWidth(lines: readonly string[], min: number = 20): number {
  const widest = lines.reduce((max, line) => Math.max(max, line.length), 0);
  return Math.max(min, widest + PADDING);
}

/**
 * Centre a content area of the given size, shrinking it to fit the
 * viewport (border included).
 */
export function centerPanel(viewport: Viewport, width: number, height: number): PanelPlacement {
  const maxWidth = Math.max(1, viewport.cols - 2 * BORDER);
  const maxHeight = Math.max(1, viewport.rows - 2 * BORDER);
  const fittedWidth = Math.min(Math.max(1, width), maxWidth);
  const fittedHeight = Math.min(Math.max(1, height), maxHeight);

  return {
    row: Math.max(BORDER, Math.floor((viewport.rows - fittedHeight) / 2)),
    col: Math.max(BORDER, Math.floor((viewport.cols - fittedWidth) / 2)),
    width: fittedWidth,
    height: fittedHeight,
  };
}

/**
 * Inner width available to the font list: the viewport minus a margin,
 * clamped to a readable range.
 */
export function listWidth(viewport: Viewport): number {
  return Math.min(96, Math.max(20, viewport.cols - 8));
}
