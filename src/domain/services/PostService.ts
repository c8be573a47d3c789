import type { Post, PostDocument } from "../entities/Post.js";
import { PostFormatError } from "../errors/PostErrors.js";
import { normalizeCategories } from "../value-objects/Categories.js";
import { baseName, parsePostFileName } from "../value-objects/PostFileName.js";
import { calendarDay, parsePostDate } from "../../shared/utils/dates.js";
import type { ExcerptService } from "./ExcerptService.js";
import type { PostLinter } from "./PostLinter.js";

export class PostService {
  constructor(
    private readonly linter: PostLinter,
    private readonly excerptService: ExcerptService
  ) {}

  /**
   * Build a post from a parsed document. Warnings are tolerated,
   * errors are not, including those of rules disabled for linting.
   */
  toPost(document: PostDocument): Post {
    const errors = this.linter.blockingErrors(document);
    const fileName = parsePostFileName(baseName(document.path));
    const date = parsePostDate(document.data.date);
    const day = calendarDay(document.data.date);

    if (errors.length > 0 || !fileName || !date || !day) {
      throw new PostFormatError(document.path, errors);
    }

    const { data, body } = document;
    const { excerpt } = this.excerptService.extract(
      body,
      this.excerptService.separatorFor(data)
    );

    return {
      path: document.path,
      slug: fileName.slug,
      fileDate: fileName.date,
      layout: typeof data.layout === "string" ? data.layout : "",
      title: String(data.title ?? "").trim(),
      date,
      day,
      categories: normalizeCategories(data),
      published: data.published !== false,
      body,
      excerpt,
      frontMatter: data,
    };
  }

  /**
   * Posts that build cleanly, plus the documents that did not.
   */
  toPosts(documents: PostDocument[]): {
    posts: Post[];
    failures: PostFormatError[];
  } {
    const posts: Post[] = [];
    const failures: PostFormatError[] = [];

    for (const document of documents) {
      try {
        posts.push(this.toPost(document));
      } catch (error) {
        if (!(error instanceof PostFormatError)) throw error;
        failures.push(error);
      }
    }

    return { posts, failures };
  }
}
