/**
 * TUI Module
 *
 * Terminal rendering of overlay panels and keyboard input.
 */

export { ANSI, stripAnsi } from './ansi.js';
export { borderChars } from './borders.js';
export type { BorderChars } from './borders.js';
export { TerminalPanelHost } from './panel-host.js';
export type { PanelOutput, TerminalPanelHostOptions } from './panel-host.js';
export { mapKeypress } from './keys.js';
export type { KeyAction, KeypressInfo } from './keys.js';
export { runKeySession } from './key-session.js';
export type { KeyInput, KeySessionOptions, KeyTarget } from './key-session.js';
