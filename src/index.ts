/**
 * fontctl - Library Entry Point
 *
 * The CLI (`fontctl`) is the usual way in:
 * ```bash
 * fontctl                    # Main menu
 * fontctl set_font FiraCode  # Set the font family
 * fontctl size_up            # Font size + 0.5
 * ```
 *
 * The same application can be driven from code with any surface host:
 *
 * @example
 * ```typescript
 * import { FontControlApp } from 'fontctl';
 *
 * const app = new FontControlApp({ host, logger: consoleLogger });
 * app.dispatch('set_size', '13');
 * app.dispatch('');          // opens the main menu on `host`
 * app.pressKey('down');
 * ```
 */

export { FontControlApp } from './app/index.js';
export type { FontControlAppOptions } from './app/index.js';

export * from './config/index.js';
export * from './errors/index.js';
export * from './fonts/index.js';
export * from './navigation/index.js';
export * from './router/index.js';
export * from './terminal/index.js';
export * from './utils/index.js';
