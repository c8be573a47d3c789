import type { PostDocument } from "../../domain/entities/Post.js";
import type { PostRepository } from "../../domain/repositories/PostRepository.js";
import type { FrontMatterParser } from "../../domain/services/FrontMatterParser.js";
import { logger } from "../../shared/utils/logger.js";

export class LoadPostsUseCase {
  constructor(
    private readonly postRepository: PostRepository,
    private readonly parser: FrontMatterParser
  ) {}

  async execute(): Promise<PostDocument[]> {
    const paths = await this.postRepository.list();
    const documents: PostDocument[] = [];

    for (const path of paths) {
      logger.debug({ path }, "Reading post");
      const raw = await this.postRepository.read(path);
      documents.push(this.parser.parse(path, raw));
    }

    logger.info({ count: documents.length }, "Loaded posts");
    return documents;
  }
}
