export const UNNAMED_PLACEHOLDER = "_unnamed_";

export const MAX_NAME_LENGTH = 200;

// Characters Windows refuses in file names, plus the space.
const RESERVED_CHARACTERS = /[\\/:*?"<>| ]/g;

/**
 * Turn a material name into a file name stem.
 *
 * @example
 * sanitize("Brick: Red/Old") // "Brick_Red_Old"
 * sanitize("")               // "_unnamed_"
 */
export function sanitize(rawName: string): string {
  const replaced = rawName
    .replace(RESERVED_CHARACTERS, "_")
    .replace(/_{2,}/g, "_")
    .slice(0, MAX_NAME_LENGTH);
  return replaced.length === 0 ? UNNAMED_PLACEHOLDER : replaced;
}
