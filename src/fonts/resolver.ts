/**
 * Font Resolver
 *
 * Produces the fonts that are both installed on the system and usable by
 * the terminal, keyed by their whitespace-free name:
 *
 *   installed: ["Fira Code", "Arial"]   terminal: ["FiraCode", "Arial"]
 *   catalog:   { FiraCode: "Fira Code", Arial: "Arial" }
 *
 * The catalog is memoized for the life of the process.
 */

import { MemoCache } from './cache.js';
import { normalizeFontKey } from './normalize.js';
import {
  execCommand,
  parseInstalledFonts,
  parseTerminalFonts,
  INSTALLED_FONTS_COMMAND,
  TERMINAL_FONTS_COMMAND,
  type CommandRunner,
  type ExternalCommand,
} from './sources.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/** Normalized font key -> display family name */
export type FontCatalog = ReadonlyMap<string, string>;

/**
 * The read side of the resolver that other components depend on.
 */
export interface FontLookup {
  /** Display name for a normalized key, if the font is compatible */
  resolve(key: string): string | undefined;
  /** Sorted display names of all compatible fonts */
  displayNames(): string[];
  /** The full catalog */
  catalog(): FontCatalog;
}

export interface FontResolverOptions {
  /** Runs external commands (default: execFileSync) */
  run?: CommandRunner;
  logger?: Logger;
}

/**
 * Intersect installed fonts with terminal-supported fonts.
 *
 * A font is compatible when its exact name or its whitespace-free name is
 * terminal-supported. When two installed names share a key, the one that
 * sorts first wins, so the result doesn't depend on input order.
 */
export function buildCatalog(
  installed: Iterable<string>,
  supported: ReadonlySet<string>
): Map<string, string> {
  const catalog = new Map<string, string>();

  for (const font of installed) {
    const key = normalizeFontKey(font);
    if (!supported.has(font) && !supported.has(key)) continue;

    const existing = catalog.get(key);
    if (existing === undefined || font < existing) {
      catalog.set(key, font);
    }
  }

  return catalog;
}

export class FontResolver implements FontLookup {
  private readonly run: CommandRunner;
  private readonly logger: Logger;
  private readonly cache: MemoCache<FontCatalog>;

  constructor(options: FontResolverOptions = {}) {
    this.run = options.run ?? execCommand;
    this.logger = options.logger ?? silentLogger;
    this.cache = new MemoCache(() => this.computeCatalog());
  }

  /**
   * Fonts installed on the system, de-duplicated.
   */
  installedFonts(): Set<string> {
    return parseInstalledFonts(this.runOrEmpty(INSTALLED_FONTS_COMMAND));
  }

  /**
   * Font families the terminal reports it can use.
   * Malformed or empty output yields an empty set.
   */
  terminalSupportedFonts(): Set<string> {
    return parseTerminalFonts(this.runOrEmpty(TERMINAL_FONTS_COMMAND));
  }

  catalog(): FontCatalog {
    return this.cache.getOrCompute();
  }

  resolve(key: string): string | undefined {
    return this.catalog().get(normalizeFontKey(key));
  }

  displayNames(): string[] {
    return [...this.catalog().values()].sort();
  }

  /**
   * Forget the catalog; the next lookup runs the font commands again.
   */
  invalidate(): void {
    this.cache.invalidate();
  }

  private computeCatalog(): FontCatalog {
    const installed = this.installedFonts();
    const supported = this.terminalSupportedFonts();
    const catalog = buildCatalog(installed, supported);

    this.logger.debug?.(
      `Font catalog: ${installed.size} installed, ${supported.size} terminal-supported, ${catalog.size} compatible`
    );

    return catalog;
  }

  /**
   * Run an external command, degrading to empty output when it can't be
   * spawned or fails.
   */
  private runOrEmpty(command: ExternalCommand): string {
    try {
      return this.run(command.file, command.args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not run ${command.file}: ${message}`);
      return '';
    }
  }
}
