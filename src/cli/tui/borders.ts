/**
 * Box-drawing characters for each border style.
 */

import type { BorderStyle } from '../../config/index.js';

export interface BorderChars {
  topLeft: string;
  top: string;
  topRight: string;
  left: string;
  right: string;
  bottomLeft: string;
  bottom: string;
  bottomRight: string;
}

const SINGLE: BorderChars = {
  topLeft: '┌', top: '─', topRight: '┐',
  left: '│', right: '│',
  bottomLeft: '└', bottom: '─', bottomRight: '┘',
};

const DOUBLE: BorderChars = {
  topLeft: '╔', top: '═', topRight: '╗',
  left: '║', right: '║',
  bottomLeft: '╚', bottom: '═', bottomRight: '╝',
};

const ROUNDED: BorderChars = {
  ...SINGLE,
  topLeft: '╭', topRight: '╮',
  bottomLeft: '╰', bottomRight: '╯',
};

// Blank padding around the content
const SOLID: BorderChars = {
  topLeft: ' ', top: ' ', topRight: ' ',
  left: ' ', right: ' ',
  bottomLeft: ' ', bottom: ' ', bottomRight: ' ',
};

// Drop shadow on the right and bottom edges only
const SHADOW: BorderChars = {
  ...SOLID,
  topRight: ' ', right: '▒',
  bottom: '▒', bottomRight: '▒',
};

/**
 * Characters for a border style; null for `none`.
 */
export function borderChars(style: BorderStyle): BorderChars | null {
  switch (style) {
    case 'none':
      return null;
    case 'single':
      return SINGLE;
    case 'double':
      return DOUBLE;
    case 'rounded':
      return ROUNDED;
    case 'solid':
      return SOLID;
    case 'shadow':
      return SHADOW;
  }
}
