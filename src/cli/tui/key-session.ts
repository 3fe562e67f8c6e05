/**
 * Key Session
 *
 * Feeds raw keypresses to the application while a panel is open. Resolves
 * once the application is back in the closed state.
 */

import { emitKeypressEvents } from 'node:readline';
import type { NavigationState, PanelKey } from '../../navigation/types.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { mapKeypress, type KeypressInfo } from './keys.js';

/**
 * The parts of the application a key session drives.
 */
export interface KeyTarget {
  readonly state: NavigationState;
  pressKey(key: PanelKey): void;
  shutdown(): void;
}

/**
 * A readable stream that may be a TTY.
 */
export interface KeyInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface KeySessionOptions {
  /** Input stream (default: process.stdin) */
  input?: KeyInput;
  logger?: Logger;
}

export function runKeySession(target: KeyTarget, options: KeySessionOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const logger = options.logger ?? silentLogger;

  return new Promise((resolve) => {
    if (target.state === 'closed') {
      resolve();
      return;
    }

    if (!input.isTTY) {
      logger.warn('Panels need an interactive terminal; closing');
      target.shutdown();
      resolve();
      return;
    }

    const finish = (): void => {
      input.off('keypress', onKeypress);
      input.setRawMode?.(false);
      input.pause();
      resolve();
    };

    const onKeypress = (str: string | undefined, key: KeypressInfo | undefined): void => {
      const action = mapKeypress(str, key);

      if (action === 'interrupt') {
        target.shutdown();
      } else if (action !== undefined) {
        target.pressKey(action);
      }

      if (target.state === 'closed') {
        finish();
      }
    };

    emitKeypressEvents(input);
    input.setRawMode?.(true);
    input.on('keypress', onKeypress);
    input.resume();
  });
}
