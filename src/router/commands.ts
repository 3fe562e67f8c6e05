/**
 * Commands
 *
 * An action token plus an optional argument, parsed into one of a fixed
 * set of commands. The empty action opens the main menu.
 *
 *   (none)              main menu
 *   check [font]        print current font, or check a font is usable
 *   float_check         current font in a panel
 *   set_font [family]   set directly, or open the family picker
 *   set_size [size]     set directly, or open the size control
 *   list                print compatible fonts
 *   float_list          compatible fonts in a panel
 *   close               close the open panel
 *   size_up/size_down   step the font size by 0.5
 */

export const ACTIONS = [
  'check',
  'float_check',
  'set_font',
  'set_size',
  'list',
  'float_list',
  'close',
  'size_up',
  'size_down',
] as const;

export type Action = (typeof ACTIONS)[number];

export type Command =
  | { type: 'main-menu' }
  | { type: 'check'; font?: string }
  | { type: 'show-info' }
  | { type: 'set-family'; family?: string }
  | { type: 'set-size'; size?: string }
  | { type: 'list' }
  | { type: 'show-list' }
  | { type: 'close' }
  | { type: 'size-up' }
  | { type: 'size-down' };

export function isAction(token: string): token is Action {
  return (ACTIONS as readonly string[]).includes(token);
}

/**
 * Parse an action token and optional argument.
 *
 * @returns The command, or undefined for an unknown action
 */
export function parseCommand(action: string, argument?: string): Command | undefined {
  const token = action.trim();
  const arg = argument?.trim() || undefined;

  if (token === '') {
    return { type: 'main-menu' };
  }

  if (!isAction(token)) {
    return undefined;
  }

  switch (token) {
    case 'check':
      return { type: 'check', font: arg };
    case 'float_check':
      return { type: 'show-info' };
    case 'set_font':
      return { type: 'set-family', family: arg };
    case 'set_size':
      return { type: 'set-size', size: arg };
    case 'list':
      return { type: 'list' };
    case 'float_list':
      return { type: 'show-list' };
    case 'close':
      return { type: 'close' };
    case 'size_up':
      return { type: 'size-up' };
    case 'size_down':
      return { type: 'size-down' };
  }
}
