/**
 * Trim trailing slashes.
 *
 * @param path
 * @returns
 */
export function trimSlash(path: string): string {
  while (path.endsWith("/")) {
    path = path.slice(0, -"/".length);
  }

  return path;
}

/**
 * Build a data path from its segments. The root is `/`.
 *
 * Segments are not escaped: a key containing "/" reads as two levels.
 *
 * @param segments
 * @returns
 */
export function toPath(segments: readonly string[]): string {
  return "/" + segments.join("/");
}

/**
 * Append a path that is relative to `base` (itself rooted at `/`).
 *
 * @param base
 * @param relative
 * @returns
 */
export function appendPath(base: string, relative: string): string {
  if (relative === "/") return base;

  return trimSlash(base) + relative;
}
