export interface Post {
  path: string;
  slug: string;
  fileDate: string; // YYYY-MM-DD from the file name
  layout: string;
  title: string;
  date: Date;
  day: string; // YYYY-MM-DD the front matter date was written for
  categories: string[];
  published: boolean;
  body: string;
  excerpt: string;
  frontMatter: Record<string, unknown>;
}

/**
 * A parsed file before it is known to be a valid post.
 * Line numbers are 1-based file lines.
 */
export interface PostDocument {
  path: string;
  raw: string;
  hasFrontMatter: boolean;
  frontMatterClosed: boolean;
  data: Record<string, unknown>;
  yamlError?: { message: string; line?: number };
  body: string;
  bodyStartLine: number;
}

export interface PostDraft {
  layout: string;
  title: string;
  date: string;
  categories: string[];
  body: string;
}
