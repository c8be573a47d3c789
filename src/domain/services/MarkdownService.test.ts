import { describe, it, expect } from "vitest";
import { MarkdownService } from "./MarkdownService.js";
import { FrontMatterParser } from "./FrontMatterParser.js";
import type { Post } from "../entities/Post.js";

function makePost(path: string, title: string): Post {
  return {
    path,
    slug: path.slice(11, -3),
    fileDate: path.slice(0, 10),
    layout: "post",
    title,
    date: new Date(Date.UTC(2015, 2, 1)),
    day: path.slice(0, 10),
    categories: ["cpp"],
    published: true,
    body: "",
    excerpt: "",
    frontMatter: {},
  };
}

describe("MarkdownService", () => {
  const service = new MarkdownService();
  const tricks = makePost("2015-03-01-template-tricks.md", "Template [tricks]");
  const maps = makePost("2015-03-20-karnaugh-maps.md", "Karnaugh maps");

  describe("categoryIndexToMarkdown", () => {
    it("should render one section per category", () => {
      expect(
        service.categoryIndexToMarkdown([
          { name: "cpp", posts: [tricks] },
          { name: "logic", posts: [maps] },
        ])
      ).toBe(
        "# Categories\n\n" +
          "## cpp\n\n" +
          "- 2015-03-01 [Template \\[tricks\\]](2015-03-01-template-tricks.md)\n\n" +
          "## logic\n\n" +
          "- 2015-03-20 [Karnaugh maps](2015-03-20-karnaugh-maps.md)\n\n"
      );
    });

    it("should say when there is nothing to list", () => {
      expect(service.categoryIndexToMarkdown([])).toBe(
        "# Categories\n\nNo categorized posts.\n"
      );
    });
  });

  describe("archiveToMarkdown", () => {
    it("should render years and month names", () => {
      expect(
        service.archiveToMarkdown([
          { year: "2015", months: [{ month: "03", posts: [maps, tricks] }] },
        ])
      ).toBe(
        "# Archive\n\n" +
          "## 2015\n\n" +
          "### March\n\n" +
          "- 2015-03-20 [Karnaugh maps](2015-03-20-karnaugh-maps.md)\n" +
          "- 2015-03-01 [Template \\[tricks\\]](2015-03-01-template-tricks.md)\n\n"
      );
    });
  });

  describe("lintReportToMarkdown", () => {
    it("should render a table of diagnostics", () => {
      expect(
        service.lintReportToMarkdown({
          files: 2,
          errorCount: 1,
          warningCount: 1,
          diagnostics: [
            {
              rule: "file-name",
              severity: "error",
              message: 'File name "a|b.md" does not follow YYYY-MM-DD-title-slug.md',
              path: "a|b.md",
            },
            {
              rule: "date-mismatch",
              severity: "warning",
              message: "File name date 2015-03-01 differs from front matter date 2015-03-02",
              path: "2015-03-01-a.md",
              line: 4,
            },
          ],
        })
      ).toBe(
        "# Post lint report\n\n" +
          "**Files:** 2 | **Errors:** 1 | **Warnings:** 1\n\n" +
          "| File | Line | Severity | Rule | Message |\n" +
          "| --- | --- | --- | --- | --- |\n" +
          '| a\\|b.md |  | error | file-name | File name "a\\|b.md" does not follow YYYY-MM-DD-title-slug.md |\n' +
          "| 2015-03-01-a.md | 4 | warning | date-mismatch | File name date 2015-03-01 differs from front matter date 2015-03-02 |\n"
      );
    });

    it("should report a clean run", () => {
      expect(
        service.lintReportToMarkdown({
          files: 3,
          errorCount: 0,
          warningCount: 0,
          diagnostics: [],
        })
      ).toBe(
        "# Post lint report\n\n**Files:** 3 | **Errors:** 0 | **Warnings:** 0\n\nNo problems found.\n"
      );
    });
  });

  describe("postToMarkdown", () => {
    it("should write front matter the parser reads back", () => {
      const markdown = service.postToMarkdown({
        layout: "post",
        title: "Template tricks",
        date: "2015-03-01 12:00:00 +0100",
        categories: ["cpp", "templates"],
        body: "Intro.\n",
      });

      expect(markdown.startsWith("---\nlayout: post\ntitle: Template tricks\n")).toBe(
        true
      );

      const document = new FrontMatterParser().parse(
        "2015-03-01-template-tricks.md",
        markdown
      );
      expect(document.data).toEqual({
        layout: "post",
        title: "Template tricks",
        date: "2015-03-01 12:00:00 +0100",
        categories: ["cpp", "templates"],
      });
      expect(document.body).toBe("Intro.\n");
    });
  });
});
