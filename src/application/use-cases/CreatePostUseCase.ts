import type { PostRepository } from "../../domain/repositories/PostRepository.js";
import type { MarkdownService } from "../../domain/services/MarkdownService.js";
import { PostExistsError } from "../../domain/errors/PostErrors.js";
import { buildPostFileName } from "../../domain/value-objects/PostFileName.js";
import { formatPostDate } from "../../shared/utils/dates.js";
import { logger } from "../../shared/utils/logger.js";

export interface NewPostInput {
  title: string;
  categories: string[];
  date?: Date;
  layout?: string;
  body?: string;
}

export class CreatePostUseCase {
  constructor(
    private readonly postRepository: PostRepository,
    private readonly markdownService: MarkdownService,
    private readonly defaultLayout: string
  ) {}

  async execute(input: NewPostInput): Promise<string> {
    const title = input.title.trim();
    if (title.length === 0) {
      throw new Error("A post needs a title");
    }

    const date = input.date ?? new Date();
    const path = buildPostFileName(date, title);

    if (await this.postRepository.exists(path)) {
      throw new PostExistsError(path);
    }

    const categories = [
      ...new Set(
        input.categories.map((c) => c.trim()).filter((c) => c.length > 0)
      ),
    ];
    const content = this.markdownService.postToMarkdown({
      layout: input.layout ?? this.defaultLayout,
      title,
      date: formatPostDate(date),
      categories,
      body: input.body ?? "",
    });

    await this.postRepository.write(path, content);
    logger.info({ path, title }, "Created post");
    return path;
  }
}
