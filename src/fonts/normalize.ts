/**
 * Normalize a font family name into a catalog key by removing all
 * whitespace: "Fira Code" -> "FiraCode".
 */
export function normalizeFontKey(name: string): string {
  return name.replace(/\s+/g, '');
}
