import matter from "gray-matter";
import type { PostDocument } from "../entities/Post.js";

const OPEN_DELIMITER = /^---[ \t]*$/;
const CLOSE_DELIMITER = /^(?:---|\.\.\.)[ \t]*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// js-yaml reports the 0-based line inside the YAML block
function yamlErrorLine(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  const mark = error.mark;
  if (isRecord(mark) && typeof mark.line === "number") {
    return mark.line + 2;
  }
  return undefined;
}

function yamlErrorMessage(error: unknown): string {
  if (isRecord(error) && typeof error.reason === "string") {
    return error.reason;
  }
  return error instanceof Error ? error.message : String(error);
}

export class FrontMatterParser {
  parse(path: string, raw: string): PostDocument {
    const text = raw.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
    const lines = text.split("\n");

    if (!OPEN_DELIMITER.test(lines[0])) {
      return {
        path,
        raw: text,
        hasFrontMatter: false,
        frontMatterClosed: false,
        data: {},
        body: text,
        bodyStartLine: 1,
      };
    }

    const closeIndex = lines.findIndex(
      (line, index) => index > 0 && CLOSE_DELIMITER.test(line)
    );
    if (closeIndex === -1) {
      return {
        path,
        raw: text,
        hasFrontMatter: true,
        frontMatterClosed: false,
        data: {},
        body: "",
        bodyStartLine: lines.length + 1,
      };
    }

    const document: PostDocument = {
      path,
      raw: text,
      hasFrontMatter: true,
      frontMatterClosed: true,
      data: {},
      body: lines.slice(closeIndex + 1).join("\n"),
      bodyStartLine: closeIndex + 2,
    };

    const block = lines.slice(1, closeIndex).join("\n");
    if (block.trim().length === 0) {
      return document;
    }

    try {
      // Passing options keeps gray-matter from caching by content
      const parsed = matter(`---\n${block}\n---\n`, { language: "yaml" });
      if (isRecord(parsed.data)) {
        document.data = parsed.data;
      } else {
        document.yamlError = { message: "front matter is not a mapping", line: 2 };
      }
    } catch (error) {
      document.yamlError = {
        message: yamlErrorMessage(error),
        line: yamlErrorLine(error),
      };
    }

    return document;
  }
}
