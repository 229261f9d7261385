/**
 * Identifier case transforms shared by every backend
 *
 * Only ASCII letters change case; every other character passes through, so a
 * transform never changes the length of a character. Identifiers coming out of
 * the parser are never empty; an empty input is returned unchanged.
 */

function isUpper(ch: string): boolean {
  return ch >= 'A' && ch <= 'Z';
}

function isLower(ch: string): boolean {
  return ch >= 'a' && ch <= 'z';
}

function toUpper(ch: string): string {
  return isLower(ch) ? ch.toUpperCase() : ch;
}

function toLower(ch: string): string {
  return isUpper(ch) ? ch.toLowerCase() : ch;
}

export function capitalize(name: string): string {
  return toUpper(name.charAt(0)) + name.slice(1);
}

export function decapitalize(name: string): string {
  return toLower(name.charAt(0)) + name.slice(1);
}

export function lowercase(name: string): string {
  let result = '';
  for (const ch of name) {
    result += toLower(ch);
  }
  return result;
}

/**
 * Transform a camel case identifier into one separated by underscores
 *
 *   aMultiWord -> a_multi_word
 *   CamelCase  -> camel_case
 *   Name       -> name
 *   HTTPCode   -> h_t_t_p_code
 */
export function camelToSnake(name: string): string {
  if (name.length === 0) return name;

  let result = toLower(name.charAt(0));
  for (let i = 1; i < name.length; i++) {
    const ch = name.charAt(i);
    if (isUpper(ch)) {
      result += '_' + toLower(ch);
    } else {
      result += ch;
    }
  }
  return result;
}

/**
 * Transform an underscore separated identifier into camel case
 *
 *   a_multi_word -> aMultiWord
 *   some_name    -> someName
 *   name         -> name
 */
export function snakeToCamel(name: string): string {
  let result = '';
  let pendingUpper = false;

  for (const ch of name) {
    if (ch === '_') {
      pendingUpper = true;
      continue;
    }
    if (pendingUpper) {
      result += toUpper(ch);
      pendingUpper = false;
      continue;
    }
    result += ch;
  }

  return result;
}
