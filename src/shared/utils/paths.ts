/**
 * Normalize a path relative to the posts root. Absolute paths and paths
 * that climb out of the root are refused.
 */
export function normalizePostPath(path: string): string {
  const segments = path.replace(/\\/g, "/").split("/");
  if (path.startsWith("/") || /^[A-Za-z]:/.test(path)) {
    throw new Error(`Post path must be relative: ${path}`);
  }

  const normalized: string[] = [];
  for (const segment of segments) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      throw new Error(`Post path leaves the posts directory: ${path}`);
    }
    normalized.push(segment);
  }

  if (normalized.length === 0) {
    throw new Error(`Post path is empty: ${JSON.stringify(path)}`);
  }
  return normalized.join("/");
}

// Hidden files and `_` prefixed entries are not posts
export function isIgnoredEntry(name: string): boolean {
  return name.startsWith(".") || name.startsWith("_");
}
