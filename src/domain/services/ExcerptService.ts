import { isInsideFence, lineOfOffset, scanFences } from "./CodeFenceScanner.js";

export interface Excerpt {
  excerpt: string;
  explicit: boolean;
  separatorLine: number | null; // 0-based body line
  separatorInCode: boolean;
}

export class ExcerptService {
  constructor(private readonly defaultSeparator: string) {}

  /**
   * A post's own `excerpt_separator` wins over the configured one.
   */
  separatorFor(frontMatter: Record<string, unknown>): string {
    const own = frontMatter.excerpt_separator;
    return typeof own === "string" && own.length > 0
      ? own
      : this.defaultSeparator;
  }

  extract(body: string, separator: string = this.defaultSeparator): Excerpt {
    const index = separator.length > 0 ? body.indexOf(separator) : -1;

    if (index !== -1) {
      const separatorLine = lineOfOffset(body, index);
      return {
        excerpt: body.slice(0, index).trim(),
        explicit: true,
        separatorLine,
        separatorInCode: isInsideFence(scanFences(body), separatorLine),
      };
    }

    const [firstParagraph = ""] = body
      .replace(/^\s*\n/, "")
      .split(/\n[ \t]*\n/);
    return {
      excerpt: firstParagraph.trim(),
      explicit: false,
      separatorLine: null,
      separatorInCode: false,
    };
  }
}
