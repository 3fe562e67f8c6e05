/**
 * Keypress Mapping
 *
 * Translates readline keypress events into panel keys.
 *
 *   up / k            up
 *   down / j          down
 *   return / enter    enter
 *   escape            escape
 *   backspace         backspace
 *   q                 quit
 *   + = l right       increment
 *   - h left          decrement
 *   ctrl+c            interrupt (close everything)
 */

import type { PanelKey } from '../../navigation/types.js';

/** Shape of the `key` argument of readline's keypress event */
export interface KeypressInfo {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
  sequence?: string;
}

export type KeyAction = PanelKey | 'interrupt';

const NAMED_KEYS: Readonly<Record<string, PanelKey>> = {
  up: 'up',
  k: 'up',
  down: 'down',
  j: 'down',
  return: 'enter',
  enter: 'enter',
  escape: 'escape',
  backspace: 'backspace',
  q: 'quit',
  l: 'increment',
  right: 'increment',
  h: 'decrement',
  left: 'decrement',
};

const CHARACTER_KEYS: Readonly<Record<string, PanelKey>> = {
  '+': 'increment',
  '=': 'increment',
  '-': 'decrement',
};

/**
 * Map a keypress to a panel key.
 *
 * @returns undefined for keys panels don't use
 */
export function mapKeypress(
  str: string | undefined,
  key: KeypressInfo | undefined
): KeyAction | undefined {
  if (key?.ctrl) {
    return key.name === 'c' ? 'interrupt' : undefined;
  }
  if (key?.meta) return undefined;

  if (key?.name !== undefined) {
    const named = NAMED_KEYS[key.name];
    if (named) return named;
  }

  return str === undefined ? undefined : CHARACTER_KEYS[str];
}
