/**
 * Terminal Config Directives
 *
 * The terminal config file is a flat list of `key<whitespace>value` lines.
 * Only two keys matter here: `font_family` and `font_size`. Everything else
 * (comments, other keys, blank lines) is carried through byte for byte.
 */

export type FontDirective = 'font_family' | 'font_size';

/** sizeText used when the file has no numeric font_size */
export const DEFAULT_SIZE_TEXT = 'default';

/**
 * Font settings as written in the terminal config file.
 */
export interface FontSettings {
  /** Font family, '' when not set */
  family: string;
  /** Literal font size text, or 'default' when missing or not a number */
  sizeText: string;
}

const NUMERIC_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Matches a directive line, capturing:
 * 1. indentation + key + separator
 * 2. the value
 * 3. a trailing carriage return, if any
 */
function directivePattern(key: FontDirective): RegExp {
  return new RegExp(`^([ \\t]*${key}[ \\t]+)([^\\r]*)(\\r?)$`);
}

const FAMILY_PATTERN = directivePattern('font_family');
const SIZE_PATTERN = directivePattern('font_size');

/**
 * Parse a font size written as text. Returns undefined for anything that
 * isn't a plain positive decimal number (including 'default' and '0').
 */
export function parseSizeText(text: string): number | undefined {
  const trimmed = text.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return undefined;

  const size = Number(trimmed);
  return size > 0 ? size : undefined;
}

/**
 * Format a font size for the config file: 14 -> "14", 12.5 -> "12.5".
 */
export function formatFontSize(size: number): string {
  return String(size);
}

/**
 * Extract font settings. The last matching line for each key wins.
 */
export function parseFontSettings(content: string): FontSettings {
  let family = '';
  let sizeText = DEFAULT_SIZE_TEXT;

  for (const line of content.split('\n')) {
    const familyMatch = FAMILY_PATTERN.exec(line);
    if (familyMatch) {
      family = (familyMatch[2] ?? '').trim();
      continue;
    }

    const sizeMatch = SIZE_PATTERN.exec(line);
    if (sizeMatch) {
      const value = (sizeMatch[2] ?? '').trim();
      sizeText = parseSizeText(value) === undefined ? DEFAULT_SIZE_TEXT : value;
    }
  }

  return { family, sizeText };
}

/**
 * Result of rewriting a directive
 */
export interface DirectiveRewrite {
  content: string;
  /** 0-based index of the line that now holds the directive */
  line: number;
  /** True when no directive existed and one was appended */
  appended: boolean;
  /** Matching lines found before the rewrite */
  occurrences: number;
}

/**
 * Replace the value of the first `key` line, keeping its indentation,
 * separator and line ending. Every other line is left as is.
 *
 * When the key is absent, `key value` is appended as a new last line.
 */
export function rewriteDirective(
  content: string,
  key: FontDirective,
  value: string
): DirectiveRewrite {
  const pattern = directivePattern(key);
  const lines = content.split('\n');
  const index = lines.findIndex((line) => pattern.test(line));
  const occurrences = lines.filter((line) => pattern.test(line)).length;

  if (index === -1) {
    const separator = content.length > 0 && !content.endsWith('\n') ? '\n' : '';
    const appended = `${content}${separator}${key} ${value}\n`;
    return {
      content: appended,
      line: appended.split('\n').length - 2,
      appended: true,
      occurrences,
    };
  }

  const rewritten = lines.map((line, i) =>
    i === index
      ? line.replace(pattern, (_match, prefix: string, _old: string, cr: string) => `${prefix}${value}${cr}`)
      : line
  );

  return { content: rewritten.join('\n'), line: index, appended: false, occurrences };
}
