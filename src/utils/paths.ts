/**
 * Path helpers
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Expand a leading `~` to the home directory.
 *
 * Only `~` and `~/...` are expanded; `~user/...` is returned unchanged.
 *
 * @example
 * expandHome('~/.config/kitty/kitty.conf') // '/home/me/.config/kitty/kitty.conf'
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') {
    return home;
  }
  if (path.startsWith('~/')) {
    return join(home, path.slice(2));
  }
  return path;
}

/**
 * Replace the home directory prefix with `~` for display.
 */
export function collapseHome(path: string, home: string = homedir()): string {
  if (home && (path === home || path.startsWith(home + '/'))) {
    return '~' + path.slice(home.length);
  }
  return path;
}
