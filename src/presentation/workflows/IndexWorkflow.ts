import { LoadPostsUseCase } from "../../application/use-cases/LoadPostsUseCase.js";
import {
  BuildIndexUseCase,
  type PostIndex,
} from "../../application/use-cases/BuildIndexUseCase.js";
import { CategoryService } from "../../domain/services/CategoryService.js";
import { MarkdownService } from "../../domain/services/MarkdownService.js";
import { container } from "../../infrastructure/di/container.js";
import { logger } from "../../shared/utils/logger.js";

export interface IndexResult {
  index: PostIndex;
  markdown: string;
}

export class IndexWorkflow {
  private readonly loadPostsUseCase: LoadPostsUseCase;
  private readonly buildIndexUseCase: BuildIndexUseCase;
  private readonly markdownService = new MarkdownService();

  constructor() {
    this.loadPostsUseCase = new LoadPostsUseCase(
      container.getPostRepository(),
      container.getParser()
    );
    this.buildIndexUseCase = new BuildIndexUseCase(
      container.getPostService(),
      new CategoryService()
    );
  }

  async execute(): Promise<IndexResult> {
    logger.info("Starting index workflow");

    const documents = await this.loadPostsUseCase.execute();
    const index = this.buildIndexUseCase.execute(documents);

    const markdown = [
      this.markdownService.categoryIndexToMarkdown(index.categories),
      this.markdownService.archiveToMarkdown(index.archive),
    ].join("\n");

    logger.info({ skipped: index.skipped }, "Index workflow completed");
    return { index, markdown };
  }
}
