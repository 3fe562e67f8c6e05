/**
 * ANSI escape sequences used by the panel host.
 *
 * Key sequences:
 * - CSI n;m H       (CUP) - Cursor position to row n, column m (1-based)
 * - CSI ?1049h/l    - Alternate screen buffer
 * - CSI ?2026h/l    - Synchronized output (prevents flickering)
 */

export const ANSI = {
  ESC: '\x1b',
  CSI: '\x1b[',

  cursorTo: (row: number, col: number = 1): string => `\x1b[${row};${col}H`,
  HIDE_CURSOR: '\x1b[?25l',
  SHOW_CURSOR: '\x1b[?25h',

  CLEAR_LINE: '\x1b[2K',
  CLEAR_SCREEN: '\x1b[2J',

  BEGIN_SYNC: '\x1b[?2026h',
  END_SYNC: '\x1b[?2026l',

  ENTER_ALT_SCREEN: '\x1b[?1049h',
  EXIT_ALT_SCREEN: '\x1b[?1049l',

  RESET: '\x1b[0m',
  BOLD: '\x1b[1m',
  DIM: '\x1b[2m',
  REVERSE: '\x1b[7m',
} as const;

/** Pattern matching CSI and DEC save/restore sequences */
const ANSI_ESCAPE_PATTERN = /\x1b\[[0-9;?]*[a-zA-Z]|\x1b[78]/g;

/**
 * Remove escape sequences, leaving the visible text.
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN, '');
}
