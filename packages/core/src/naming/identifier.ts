/**
 * Pattern matching a complete ECMAScript identifier.
 * Matches: ($ | _ | \p{ID_Start}) ($ | \p{ID_Continue})*
 *
 * @see https://tc39.es/ecma262/multipage/ecmascript-language-lexical-grammar.html
 */
export const IDENTIFIER_PATTERN = /^[$_\p{ID_Start}][$\p{ID_Continue}]*$/u;

/**
 * Check if a string is a valid identifier.
 *
 * @example
 * isValidIdentifier("diffuseColor") // true
 * isValidIdentifier("_bar")         // true
 * isValidIdentifier("123abc")       // false
 * isValidIdentifier("foo-bar")      // false
 */
export function isValidIdentifier(str: string): boolean {
  if (str.length === 0) return false;
  return IDENTIFIER_PATTERN.test(str);
}

/**
 * Check if every dot-separated segment of `str` is an identifier.
 *
 * @example
 * isDottedIdentifier("texmap_diffuse.coords.blur") // true
 * isDottedIdentifier("materialList.0")             // false
 * isDottedIdentifier("a..b")                       // false
 */
export function isDottedIdentifier(str: string): boolean {
  return str.split(".").every(isValidIdentifier);
}
