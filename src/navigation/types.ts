/**
 * Navigation Types
 *
 * The panel is a tagged union: each kind carries exactly the data it
 * needs, so a size control can't have a cursor and a picker can't have a
 * size.
 */

import type { SurfaceHandle } from './surface.js';

export enum PanelKind {
  MAIN_MENU = 'main-menu',
  FAMILY_PICKER = 'family-picker',
  SIZE_CONTROL = 'size-control',
  FONT_INFO = 'font-info',
  FONT_LIST = 'font-list',
}

/** `closed` when no panel is displayed */
export type NavigationState = PanelKind | 'closed';

/**
 * Keys the host delivers to an open panel.
 */
export type PanelKey =
  | 'up'
  | 'down'
  | 'enter'
  | 'escape'
  | 'backspace'
  | 'quit'
  | 'increment'
  | 'decrement';

export interface MenuItem {
  label: string;
  target: PanelKind;
}

export const MAIN_MENU_ITEMS: readonly MenuItem[] = [
  { label: 'Check current font', target: PanelKind.FONT_INFO },
  { label: 'Set font family', target: PanelKind.FAMILY_PICKER },
  { label: 'Set font size', target: PanelKind.SIZE_CONTROL },
  { label: 'Show installed fonts', target: PanelKind.FONT_LIST },
];

interface PanelBase {
  handle: SurfaceHandle;
}

export interface MainMenuPanel extends PanelBase {
  kind: PanelKind.MAIN_MENU;
  items: readonly MenuItem[];
  cursor: number;
}

export interface FamilyPickerPanel extends PanelBase {
  kind: PanelKind.FAMILY_PICKER;
  /** Sorted display names */
  items: readonly string[];
  cursor: number;
}

export interface SizeControlPanel extends PanelBase {
  kind: PanelKind.SIZE_CONTROL;
  size: number;
}

export interface FontInfoPanel extends PanelBase {
  kind: PanelKind.FONT_INFO;
  text: readonly string[];
}

export interface FontListPanel extends PanelBase {
  kind: PanelKind.FONT_LIST;
  text: readonly string[];
  /** First visible row */
  scroll: number;
  /** Rows that fit on screen */
  visibleRows: number;
}

export type Panel =
  | MainMenuPanel
  | FamilyPickerPanel
  | SizeControlPanel
  | FontInfoPanel
  | FontListPanel;

/** Panels with a movable cursor */
export type CursorPanel = MainMenuPanel | FamilyPickerPanel;
