/**
 * Command-line Completion
 *
 * Given the arguments typed so far (without the program name), returns
 * candidates for the word under the cursor:
 * - action names while no action is complete
 * - compatible font keys after `set_font`
 * - nothing otherwise
 */

import type { FontLookup } from '../fonts/resolver.js';
import { ACTIONS } from './commands.js';

export function completeCommandLine(
  line: string,
  fonts: Pick<FontLookup, 'catalog'>
): string[] {
  const words = line.split(/\s+/).filter(Boolean);
  const startsNewWord = line === '' || /\s$/.test(line);
  const lead = startsNewWord ? '' : words.pop() ?? '';

  if (words.length === 0) {
    return ACTIONS.filter((action) => action.startsWith(lead));
  }

  if (words.length === 1 && words[0] === 'set_font') {
    const search = lead.toLowerCase();
    return [...fonts.catalog().keys()]
      .filter((key) => key.toLowerCase().includes(search))
      .sort();
  }

  return [];
}
