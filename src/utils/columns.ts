/**
 * Column Layout Utility
 *
 * Lays out a list of short strings in as many columns as fit a given width,
 * filling each column top to bottom (the way `ls` does).
 */

/**
 * Options for column layout
 */
export interface ColumnLayoutOptions {
  /** Spaces between columns (default: 2) */
  gap?: number;
}

/**
 * Pad a string on the right to a given width
 */
function padEnd(str: string, width: number): string {
  const padding = width - str.length;
  return padding > 0 ? str + ' '.repeat(padding) : str;
}

/**
 * Format items into column-major rows that fit `width` characters.
 *
 * Always produces at least one column, even when an item is wider than
 * `width`. Trailing spaces are trimmed from every row.
 *
 * @example
 * ```ts
 * formatColumns(['Arial', 'Fira Code', 'Hack', 'Iosevka', 'Mono'], 20);
 * // [
 * //   'Arial      Iosevka',
 * //   'Fira Code  Mono',
 * //   'Hack',
 * // ]
 * ```
 */
export function formatColumns(
  items: readonly string[],
  width: number,
  options: ColumnLayoutOptions = {}
): string[] {
  if (items.length === 0) return [];

  const gap = options.gap ?? 2;
  const cellWidth = Math.max(...items.map((item) => item.length));
  const columnCount = Math.max(1, Math.floor((width + gap) / (cellWidth + gap)));
  const rowCount = Math.ceil(items.length / columnCount);

  const rows: string[] = [];
  for (let row = 0; row < rowCount; row++) {
    const cells: string[] = [];
    for (let column = 0; column < columnCount; column++) {
      const item = items[column * rowCount + row];
      if (item !== undefined) {
        cells.push(padEnd(item, cellWidth));
      }
    }
    rows.push(cells.join(' '.repeat(gap)).trimEnd());
  }

  return rows;
}
