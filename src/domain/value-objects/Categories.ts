function toEntries(value: unknown): string[] {
  if (typeof value === "string") return value.split(/\s+/);
  if (typeof value === "number") return [String(value)];
  if (Array.isArray(value)) {
    return value
      .filter(
        (item): item is string | number =>
          typeof item === "string" || typeof item === "number"
      )
      .map(String);
  }
  return [];
}

/**
 * Categories from `categories` (a list, or a space separated string)
 * followed by the singular `category`.
 */
export function normalizeCategories(
  frontMatter: Record<string, unknown>
): string[] {
  const entries = [
    ...toEntries(frontMatter.categories),
    ...toEntries(frontMatter.category),
  ]
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  return [...new Set(entries)];
}
