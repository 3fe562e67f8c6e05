/**
 * In-memory surface host
 *
 * Records every panel the engine creates so tests can assert on what
 * would have been drawn.
 */

import type {
  PanelSpec,
  SurfaceHandle,
  SurfaceHost,
  Viewport,
} from '../navigation/surface.js';

export interface FakePanel {
  spec: PanelSpec;
  lines: readonly string[];
  cursor: number | undefined;
  scroll: number;
  destroyed: boolean;
}

export interface FakeSurfaceHostOptions {
  viewport?: Viewport;
  /** Make createPanel throw with this message */
  failCreate?: string;
}

export class FakeSurfaceHost implements SurfaceHost {
  readonly panels: FakePanel[] = [];
  private readonly size: Viewport;
  failCreate: string | undefined;

  constructor(options: FakeSurfaceHostOptions = {}) {
    this.size = options.viewport ?? { rows: 40, cols: 120 };
    this.failCreate = options.failCreate;
  }

  viewport(): Viewport {
    return this.size;
  }

  createPanel(spec: PanelSpec): SurfaceHandle {
    if (this.failCreate !== undefined) {
      throw new Error(this.failCreate);
    }

    const panel: FakePanel = { spec, lines: spec.lines, cursor: spec.cursor, scroll: 0, destroyed: false };
    this.panels.push(panel);

    return {
      setLines: (lines) => {
        panel.lines = lines;
      },
      setCursor: (index) => {
        panel.cursor = index;
      },
      scrollTo: (top) => {
        panel.scroll = top;
      },
      destroy: () => {
        panel.destroyed = true;
      },
    };
  }

  /** Panels not yet destroyed */
  get live(): FakePanel[] {
    return this.panels.filter((panel) => !panel.destroyed);
  }

  /** Most recently created panel */
  get last(): FakePanel | undefined {
    return this.panels[this.panels.length - 1];
  }
}
