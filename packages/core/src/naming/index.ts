export { sanitize, UNNAMED_PLACEHOLDER, MAX_NAME_LENGTH } from "./sanitize.js";
export {
  IDENTIFIER_PATTERN,
  isValidIdentifier,
  isDottedIdentifier,
} from "./identifier.js";
