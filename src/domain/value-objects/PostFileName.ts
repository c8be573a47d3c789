import { format, isValid, parse } from "date-fns";

export interface PostFileName {
  date: string; // YYYY-MM-DD
  slug: string;
  extension: "md" | "markdown";
}

const FILE_NAME_PATTERN = /^(\d{4}-\d{2}-\d{2})-(.+)\.(md|markdown)$/;
const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export const POST_EXTENSIONS = [".md", ".markdown"] as const;

export function isPostFile(name: string): boolean {
  return POST_EXTENSIONS.some((extension) => name.endsWith(extension));
}

export function baseName(path: string): string {
  const index = path.lastIndexOf("/");
  return index === -1 ? path : path.slice(index + 1);
}

export function parsePostFileName(name: string): PostFileName | null {
  const match = FILE_NAME_PATTERN.exec(baseName(name));
  if (!match) return null;

  const [, date, slug, extension] = match;
  if (!isValid(parse(date, "yyyy-MM-dd", new Date()))) return null;

  return {
    date,
    slug,
    extension: extension === "markdown" ? "markdown" : "md",
  };
}

export function isConventionalSlug(slug: string): boolean {
  return SLUG_PATTERN.test(slug);
}

export function slugify(title: string): string {
  const slug = title
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
  return slug || "post";
}

export function buildPostFileName(date: Date, title: string): string {
  return `${format(date, "yyyy-MM-dd")}-${slugify(title)}.md`;
}
