/**
 * Font Control Application
 *
 * The single long-lived instance behind every entry point. Owns the active
 * setup config, the font resolver (and its cached catalog), the config
 * store, the navigation engine and the command router.
 *
 * Entry points never throw: an error from a command or keypress is
 * reported as a one-line error notice and the application stays usable.
 */

import { DEFAULT_CONFIG, resolveSetupOptions, type Config } from '../config/index.js';
import { describeError } from '../errors/index.js';
import { FontResolver } from '../fonts/resolver.js';
import type { CommandRunner } from '../fonts/sources.js';
import { NavigationEngine } from '../navigation/engine.js';
import type { SurfaceHost } from '../navigation/surface.js';
import type { NavigationState, PanelKey } from '../navigation/types.js';
import { CommandRouter } from '../router/command-router.js';
import { completeCommandLine } from '../router/completion.js';
import { ConfigStore } from '../terminal/config-store.js';
import { SignalReloader, type Reloader } from '../terminal/reloader.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { SessionLock } from '../utils/session-lock.js';

export interface FontControlAppOptions {
  /** Draws the overlay panels */
  host: SurfaceHost;
  logger?: Logger;
  /** Initial config (default: built-in defaults) */
  config?: Config;
  /** Runs fc-list and the terminal's font query */
  run?: CommandRunner;
  /** Default: SIGUSR1 to the configured terminal process */
  reloader?: Reloader;
}

export class FontControlApp {
  readonly fonts: FontResolver;
  readonly store: ConfigStore;
  readonly engine: NavigationEngine;
  readonly router: CommandRouter;

  private config: Config;
  private readonly logger: Logger;
  private readonly lock = new SessionLock();

  constructor(options: FontControlAppOptions) {
    this.config = { ...(options.config ?? DEFAULT_CONFIG) };
    this.logger = options.logger ?? silentLogger;

    const getConfig = (): Config => this.config;

    this.fonts = new FontResolver({ run: options.run, logger: this.logger });
    this.store = new ConfigStore({
      getConfig,
      fonts: this.fonts,
      reloader:
        options.reloader ??
        new SignalReloader({
          getProcessName: () => this.config.terminal_process,
          logger: this.logger,
        }),
      logger: this.logger,
    });
    this.engine = new NavigationEngine({
      host: options.host,
      store: this.store,
      fonts: this.fonts,
      getConfig,
      logger: this.logger,
    });
    this.router = new CommandRouter({
      engine: this.engine,
      store: this.store,
      fonts: this.fonts,
      logger: this.logger,
    });
  }

  /** Active setup config */
  get activeConfig(): Readonly<Config> {
    return this.config;
  }

  get state(): NavigationState {
    return this.engine.state;
  }

  /**
   * Replace the active config with defaults merged with `options`.
   * Invalid options are reported and leave the config unchanged.
   */
  setup(options?: unknown): void {
    this.guarded(() => {
      this.config = resolveSetupOptions(options);
      this.logger.debug?.(`Setup: border=${this.config.border}, terminal config=${this.config.terminal_config_path}`);
    });
  }

  /**
   * Run a command, e.g. `dispatch('set_size', '13')`.
   */
  dispatch(action: string, argument?: string): void {
    this.guarded(() => this.router.route(action, argument));
  }

  /**
   * Deliver a key to the open panel.
   */
  pressKey(key: PanelKey): void {
    this.guarded(() => this.engine.handleKey(key));
  }

  /**
   * Completion candidates for a partially typed command line.
   * Read-only, so it doesn't wait for the session lock.
   */
  complete(line: string): string[] {
    try {
      return completeCommandLine(line, this.fonts);
    } catch (error) {
      this.logger.error(describeError(error));
      return [];
    }
  }

  /**
   * Release any open panel without notices.
   */
  shutdown(): void {
    this.guarded(() => this.engine.reset());
  }

  private guarded(task: () => void): void {
    this.lock.run(() => {
      try {
        task();
      } catch (error) {
        this.logger.error(describeError(error));
      }
    });
  }
}
