/**
 * String literal escaping for generated sources
 */

export type EscapeTable = Readonly<Record<string, string>>;

/**
 * Characters that would break a double-quoted literal, and their replacements
 */
export const ESCAPE_TABLE: EscapeTable = Object.freeze({
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '"': '\\"',
  '\\': '\\\\',
} as const);

export function escapeString(text: string, table: EscapeTable = ESCAPE_TABLE): string {
  let result = '';
  for (const ch of text) {
    result += Object.hasOwn(table, ch) ? table[ch] : ch;
  }
  return result;
}
