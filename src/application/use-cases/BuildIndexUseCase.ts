import type { Post, PostDocument } from "../../domain/entities/Post.js";
import type {
  ArchiveYear,
  CategoryEntry,
  CategoryService,
} from "../../domain/services/CategoryService.js";
import type { PostService } from "../../domain/services/PostService.js";
import { logger } from "../../shared/utils/logger.js";

export interface PostIndex {
  posts: Post[];
  categories: CategoryEntry[];
  archive: ArchiveYear[];
  skipped: string[];
}

export class BuildIndexUseCase {
  constructor(
    private readonly postService: PostService,
    private readonly categoryService: CategoryService
  ) {}

  execute(documents: PostDocument[]): PostIndex {
    const { posts, failures } = this.postService.toPosts(documents);

    for (const failure of failures) {
      logger.warn(
        { path: failure.path, problems: failure.diagnostics.length },
        "Skipping post that is not well formed"
      );
    }

    const index: PostIndex = {
      posts: this.categoryService.sortPosts(posts),
      categories: this.categoryService.buildCategoryIndex(posts),
      archive: this.categoryService.buildArchive(posts),
      skipped: failures.map((failure) => failure.path),
    };

    logger.info(
      {
        posts: index.posts.length,
        categories: index.categories.length,
        skipped: index.skipped.length,
      },
      "Built post index"
    );
    return index;
  }
}
