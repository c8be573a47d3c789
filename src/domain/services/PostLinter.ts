import { z } from "zod";
import type { PostDocument } from "../entities/Post.js";
import type { Diagnostic, RuleId, Severity } from "../entities/Diagnostic.js";
import {
  baseName,
  isConventionalSlug,
  parsePostFileName,
} from "../value-objects/PostFileName.js";
import { normalizeCategories } from "../value-objects/Categories.js";
import { calendarDay, parsePostDate } from "../../shared/utils/dates.js";
import { scanFences } from "./CodeFenceScanner.js";
import type { ExcerptService } from "./ExcerptService.js";

const frontMatterShape = {
  layout: z.string().nullable(),
  title: z.union([z.string(), z.number()]).nullable(),
  date: z.union([z.date(), z.string()]).nullable(),
  categories: z
    .union([z.string(), z.array(z.union([z.string(), z.number()]))])
    .nullable(),
  category: z.union([z.string(), z.number()]).nullable(),
  published: z.boolean(),
  excerpt_separator: z.string(),
};

const frontMatterSchema = z.object(frontMatterShape).partial().passthrough();

type KnownField = keyof typeof frontMatterShape;

const EXPECTED: Record<KnownField, string> = {
  layout: "a string",
  title: "a string",
  date: "a date",
  categories: "a list or a space separated string",
  category: "a string",
  published: "true or false",
  excerpt_separator: "a string",
};

function isKnownField(key: string): key is KnownField {
  return key in EXPECTED;
}

export interface LintOptions {
  requiredFields: string[];
  disabledRules: string[];
}

export class PostLinter {
  constructor(
    private readonly options: LintOptions,
    private readonly excerptService: ExcerptService
  ) {}

  lintDocument(document: PostDocument): Diagnostic[] {
    return this.finish([
      ...this.checkFileName(document),
      ...this.checkFrontMatter(document),
      ...this.checkBody(document),
    ]);
  }

  lintCollection(documents: PostDocument[]): Diagnostic[] {
    return this.finish([
      ...documents.flatMap((document) => this.lintDocument(document)),
      ...this.checkDuplicateSlugs(documents),
    ]);
  }

  // Errors that make a document unusable as a post, whatever is disabled
  blockingErrors(document: PostDocument): Diagnostic[] {
    return this.finish(
      [
        ...this.checkFileName(document),
        ...this.checkFrontMatter(document),
        ...this.checkBody(document),
      ],
      []
    ).filter((d) => d.severity === "error");
  }

  private finish(
    diagnostics: Diagnostic[],
    disabledRules: string[] = this.options.disabledRules
  ): Diagnostic[] {
    return diagnostics
      .filter((d) => !disabledRules.includes(d.rule))
      .sort(
        (a, b) =>
          a.path.localeCompare(b.path) ||
          (a.line ?? 0) - (b.line ?? 0) ||
          a.rule.localeCompare(b.rule)
      );
  }

  private checkFileName(document: PostDocument): Diagnostic[] {
    const name = baseName(document.path);
    const parsed = parsePostFileName(name);

    if (!parsed) {
      return [
        diagnostic(
          "file-name",
          "error",
          document,
          `File name "${name}" does not follow YYYY-MM-DD-title-slug.md`
        ),
      ];
    }
    if (!isConventionalSlug(parsed.slug)) {
      return [
        diagnostic(
          "slug-format",
          "warning",
          document,
          `Slug "${parsed.slug}" should be lowercase words separated by hyphens`
        ),
      ];
    }
    return [];
  }

  private checkFrontMatter(document: PostDocument): Diagnostic[] {
    if (!document.hasFrontMatter) {
      return [
        diagnostic(
          "front-matter-missing",
          "error",
          document,
          "File does not start with a front matter block",
          1
        ),
      ];
    }
    if (!document.frontMatterClosed) {
      return [
        diagnostic(
          "front-matter-unclosed",
          "error",
          document,
          "Front matter block is never closed with ---",
          1
        ),
      ];
    }
    if (document.yamlError) {
      return [
        diagnostic(
          "front-matter-syntax",
          "error",
          document,
          `Front matter is not valid YAML: ${document.yamlError.message}`,
          document.yamlError.line
        ),
      ];
    }

    const { data } = document;
    const diagnostics: Diagnostic[] = [];

    for (const field of this.options.requiredFields) {
      if (!(field in data)) {
        diagnostics.push(
          diagnostic(
            "required-field",
            "error",
            document,
            `Missing required front matter field "${field}"`,
            1
          )
        );
      }
    }

    const invalid = new Set<string>();
    const result = frontMatterSchema.safeParse(data);
    if (!result.success) {
      for (const issue of result.error.issues) {
        const key = String(issue.path[0]);
        if (invalid.has(key)) continue;
        invalid.add(key);
        const expected = isKnownField(key) ? EXPECTED[key] : "valid";
        diagnostics.push(
          diagnostic(
            "field-type",
            "error",
            document,
            `Front matter field "${key}" must be ${expected}`,
            fieldLine(document, key)
          )
        );
      }
    }

    if ("title" in data && !invalid.has("title")) {
      const title = data.title;
      if (title === null || String(title).trim().length === 0) {
        diagnostics.push(
          diagnostic(
            "title-empty",
            "error",
            document,
            "Front matter title is empty",
            fieldLine(document, "title")
          )
        );
      }
    }

    if ("date" in data && !invalid.has("date")) {
      diagnostics.push(...this.checkDate(document));
    }

    if ("categories" in data && !invalid.has("categories")) {
      if (normalizeCategories(data).length === 0) {
        diagnostics.push(
          diagnostic(
            "categories-empty",
            "warning",
            document,
            "Front matter categories are empty",
            fieldLine(document, "categories")
          )
        );
      }
    }

    return diagnostics;
  }

  private checkDate(document: PostDocument): Diagnostic[] {
    const value = document.data.date;
    const line = fieldLine(document, "date");

    if (!parsePostDate(value)) {
      return [
        diagnostic(
          "date-invalid",
          "error",
          document,
          `Front matter date "${String(value ?? "")}" cannot be parsed`,
          line
        ),
      ];
    }

    const fileName = parsePostFileName(baseName(document.path));
    const day = calendarDay(value);
    if (fileName && day && fileName.date !== day) {
      return [
        diagnostic(
          "date-mismatch",
          "warning",
          document,
          `File name date ${fileName.date} differs from front matter date ${day}`,
          line
        ),
      ];
    }
    return [];
  }

  private checkBody(document: PostDocument): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    for (const fence of scanFences(document.body)) {
      if (fence.closeLine === null) {
        diagnostics.push(
          diagnostic(
            "fence-unclosed",
            "error",
            document,
            `Code block opened with ${fence.marker.repeat(fence.length)} is never closed`,
            document.bodyStartLine + fence.openLine
          )
        );
      }
    }

    const separator = this.excerptService.separatorFor(document.data);
    const excerpt = this.excerptService.extract(document.body, separator);
    if (excerpt.separatorInCode && excerpt.separatorLine !== null) {
      diagnostics.push(
        diagnostic(
          "excerpt-in-code",
          "warning",
          document,
          `Excerpt separator "${separator}" is inside a code block`,
          document.bodyStartLine + excerpt.separatorLine
        )
      );
    }

    return diagnostics;
  }

  private checkDuplicateSlugs(documents: PostDocument[]): Diagnostic[] {
    const firstBySlug = new Map<string, string>();
    const diagnostics: Diagnostic[] = [];

    for (const document of documents) {
      const fileName = parsePostFileName(baseName(document.path));
      if (!fileName) continue;

      const first = firstBySlug.get(fileName.slug);
      if (first === undefined) {
        firstBySlug.set(fileName.slug, document.path);
        continue;
      }
      diagnostics.push(
        diagnostic(
          "duplicate-slug",
          "error",
          document,
          `Slug "${fileName.slug}" is already used by ${first}`
        )
      );
    }

    return diagnostics;
  }
}

function diagnostic(
  rule: RuleId,
  severity: Severity,
  document: PostDocument,
  message: string,
  line?: number
): Diagnostic {
  return line === undefined
    ? { rule, severity, message, path: document.path }
    : { rule, severity, message, path: document.path, line };
}

// Line of a top-level key inside the front matter block
function fieldLine(document: PostDocument, key: string): number | undefined {
  const lines = document.raw.split("\n");
  const escaped = key.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const pattern = new RegExp(`^${escaped}\\s*:`);
  const end = document.bodyStartLine - 1;
  for (let index = 1; index < end && index < lines.length; index++) {
    if (pattern.test(lines[index])) return index + 1;
  }
  return undefined;
}
