// JSON.stringify leaves DEL, the C1 controls and the byte order mark
// unescaped; YAML does not accept them raw.
const UNESCAPED_BY_JSON = /[\u007f-\u009f\ufeff]/g;

// Characters a single-quoted YAML scalar cannot carry verbatim.
const NEEDS_ESCAPES = /[\p{Cc}\p{Cs}\ufeff\ufffe\uffff]/u;

const escapeCodeUnit = (char: string): string =>
  `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`;

/**
 * Double-quoted scalar, valid both as a JSON string and as YAML.
 */
export function doubleQuote(text: string): string {
  return JSON.stringify(text).replace(UNESCAPED_BY_JSON, escapeCodeUnit);
}

/**
 * Single-quoted YAML scalar. Backslashes stay literal, which keeps Windows
 * paths readable. Falls back to double quotes for control characters, since
 * single-quoted scalars have no escape sequences.
 */
export function singleQuote(text: string): string {
  if (NEEDS_ESCAPES.test(text)) return doubleQuote(text);
  return `'${text.replaceAll("'", "''")}'`;
}
