/**
 * Navigation Module
 *
 * Overlay panel state machine and the surface contract hosts implement.
 */

export { NavigationEngine, SIZE_STEP, FAMILY_PICKER_HEIGHT, sizeLines } from './engine.js';
export type { NavigationEngineOptions } from './engine.js';
export { PanelKind, MAIN_MENU_ITEMS } from './types.js';
export type {
  NavigationState,
  PanelKey,
  MenuItem,
  Panel,
  MainMenuPanel,
  FamilyPickerPanel,
  SizeControlPanel,
  FontInfoPanel,
  FontListPanel,
} from './types.js';
export { centerPanel, contentWidth, listWidth } from './layout.js';
export type { PanelPlacement, PanelSpec, SurfaceHandle, SurfaceHost, Viewport } from './surface.js';
