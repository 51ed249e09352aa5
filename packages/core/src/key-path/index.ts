/**
 * Location of a property in a material graph, one segment per property
 * name (or sequence index) from the top-level material down.
 */
export type KeyPath = readonly string[];

export const KEY_PATH_SEPARATOR = ".";

export const ROOT_PATH: KeyPath = Object.freeze([]);

export function joinKeyPath(path: KeyPath): string {
  return path.join(KEY_PATH_SEPARATOR);
}

export function appendKeyPath(path: KeyPath, segment: string): KeyPath {
  return [...path, segment];
}

/**
 * The segment a property is known by inside its own node.
 * Empty for the root path.
 */
export function lastSegment(path: KeyPath): string {
  return path[path.length - 1] ?? "";
}

/**
 * Inverse of joinKeyPath for segments that contain no separator.
 */
export function parseKeyPath(joined: string): KeyPath {
  if (joined === "") return ROOT_PATH;
  return joined.split(KEY_PATH_SEPARATOR);
}
