/**
 * Terminal Panel Host
 *
 * Draws overlay panels with ANSI escape sequences. The first panel switches
 * to the alternate screen buffer and the last one to close switches back,
 * so the user's scrollback is left as it was.
 *
 * Layout of a bordered panel (content area at row/col, 0-based):
 * ```
 * ┌ title ─────────┐   <- row - 1
 * │ line 0         │   <- row
 * │ line 1 (cursor)│      reverse video
 * └────────────────┘   <- row + height
 * ```
 *
 * Notices shown while a panel is open go on the bottom row of the screen.
 */

import type {
  PanelSpec,
  SurfaceHandle,
  SurfaceHost,
  Viewport,
} from '../../navigation/surface.js';
import { ANSI } from './ansi.js';
import { borderChars } from './borders.js';

/** Fallback size when the output isn't a terminal */
const DEFAULT_VIEWPORT: Viewport = { rows: 24, cols: 80 };

/**
 * The parts of a TTY write stream the host uses.
 */
export interface PanelOutput {
  write(data: string): unknown;
  rows?: number;
  columns?: number;
}

export interface TerminalPanelHostOptions {
  /** Output stream (default: process.stdout) */
  stdout?: PanelOutput;
  /** Use the alternate screen buffer (default: true) */
  useAlternateScreen?: boolean;
  /** Wrap each frame in synchronized output (default: true) */
  useSynchronizedOutput?: boolean;
}

interface LivePanel {
  spec: PanelSpec;
  lines: readonly string[];
  cursor: number | undefined;
  /** First visible line */
  scroll: number;
}

/**
 * Fit text to exactly `width` columns.
 */
function fit(text: string, width: number): string {
  return text.length >= width ? text.slice(0, width) : text + ' '.repeat(width - text.length);
}

export class TerminalPanelHost implements SurfaceHost {
  private readonly stdout: PanelOutput;
  private readonly useAlternateScreen: boolean;
  private readonly useSynchronizedOutput: boolean;
  private readonly live = new Set<LivePanel>();
  private notice: string | null = null;

  constructor(options: TerminalPanelHostOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.useAlternateScreen = options.useAlternateScreen ?? true;
    this.useSynchronizedOutput = options.useSynchronizedOutput ?? true;
  }

  /** Whether any panel is on screen */
  get isActive(): boolean {
    return this.live.size > 0;
  }

  viewport(): Viewport {
    return {
      rows: this.stdout.rows ?? DEFAULT_VIEWPORT.rows,
      cols: this.stdout.columns ?? DEFAULT_VIEWPORT.cols,
    };
  }

  createPanel(spec: PanelSpec): SurfaceHandle {
    if (this.live.size === 0) {
      this.notice = null;
      if (this.useAlternateScreen) {
        this.stdout.write(ANSI.ENTER_ALT_SCREEN);
      }
      this.stdout.write(ANSI.HIDE_CURSOR);
    }

    const panel: LivePanel = { spec, lines: spec.lines, cursor: spec.cursor, scroll: 0 };
    this.scrollToCursor(panel);
    this.live.add(panel);
    this.redraw();

    return {
      setLines: (lines) => {
        panel.lines = lines;
        this.scrollToCursor(panel);
        this.redraw();
      },
      setCursor: (index) => {
        panel.cursor = index;
        this.scrollToCursor(panel);
        this.redraw();
      },
      scrollTo: (top) => {
        panel.scroll = top;
        this.scrollToCursor(panel);
        this.redraw();
      },
      destroy: () => {
        if (!this.live.delete(panel)) return;

        if (this.live.size === 0) {
          this.stdout.write(ANSI.CLEAR_SCREEN);
          this.stdout.write(ANSI.SHOW_CURSOR);
          if (this.useAlternateScreen) {
            this.stdout.write(ANSI.EXIT_ALT_SCREEN);
          }
        } else {
          this.redraw();
        }
      },
    };
  }

  /**
   * Show a one-line message on the bottom row while a panel is open.
   */
  showNotice(message: string): void {
    this.notice = message;
    this.redraw();
  }

  private scrollToCursor(panel: LivePanel): void {
    const { height } = panel.spec;
    const maxScroll = Math.max(0, panel.lines.length - height);

    if (panel.cursor !== undefined) {
      if (panel.cursor < panel.scroll) {
        panel.scroll = panel.cursor;
      } else if (panel.cursor >= panel.scroll + height) {
        panel.scroll = panel.cursor - height + 1;
      }
    }

    panel.scroll = Math.min(Math.max(0, panel.scroll), maxScroll);
  }

  private redraw(): void {
    let frame = this.useSynchronizedOutput ? ANSI.BEGIN_SYNC : '';
    frame += ANSI.CLEAR_SCREEN;

    for (const panel of this.live) {
      frame += this.renderPanel(panel);
    }

    if (this.notice !== null) {
      const { rows, cols } = this.viewport();
      frame += ANSI.cursorTo(rows, 1) + ANSI.CLEAR_LINE + this.notice.slice(0, cols);
    }

    if (this.useSynchronizedOutput) {
      frame += ANSI.END_SYNC;
    }

    this.stdout.write(frame);
  }

  private renderPanel(panel: LivePanel): string {
    const { row, col, width, height, title, border } = panel.spec;
    const chars = borderChars(border);
    let out = '';

    for (let i = 0; i < height; i++) {
      const index = panel.scroll + i;
      const text = fit(panel.lines[index] ?? '', width);
      const body = index === panel.cursor ? ANSI.REVERSE + text + ANSI.RESET : text;

      out += ANSI.cursorTo(row + i + 1, col + 1 - (chars ? 1 : 0));
      out += chars ? chars.left + body + chars.right : body;
    }

    if (chars) {
      const label = title.slice(0, width);
      out += ANSI.cursorTo(row, col);
      out += chars.topLeft + ANSI.BOLD + label + ANSI.RESET + chars.top.repeat(width - label.length) + chars.topRight;
      out += ANSI.cursorTo(row + height + 1, col);
      out += chars.bottomLeft + chars.bottom.repeat(width) + chars.bottomRight;
    }

    return out;
  }
}
