import {
  CreatePostUseCase,
  type NewPostInput,
} from "../../application/use-cases/CreatePostUseCase.js";
import { MarkdownService } from "../../domain/services/MarkdownService.js";
import { container } from "../../infrastructure/di/container.js";
import { logger } from "../../shared/utils/logger.js";

export class NewPostWorkflow {
  private readonly createPostUseCase: CreatePostUseCase;

  constructor() {
    this.createPostUseCase = new CreatePostUseCase(
      container.getPostRepository(),
      new MarkdownService(),
      container.getConfig().DEFAULT_LAYOUT
    );
  }

  async execute(input: NewPostInput): Promise<string> {
    logger.info({ title: input.title }, "Starting new post workflow");
    const path = await this.createPostUseCase.execute(input);
    logger.info({ path }, "New post workflow completed");
    return path;
  }
}
