import { FileSystemPostRepository } from "../filesystem/FileSystemPostRepository.js";
import { GitHubPostRepository } from "../github/GitHubPostRepository.js";
import { ExcerptService } from "../../domain/services/ExcerptService.js";
import { FrontMatterParser } from "../../domain/services/FrontMatterParser.js";
import { PostLinter } from "../../domain/services/PostLinter.js";
import { PostService } from "../../domain/services/PostService.js";
import type { PostRepository } from "../../domain/repositories/PostRepository.js";
import {
  env,
  getRepoInfo,
  getRequiredFields,
  type Env,
} from "../../shared/config/index.js";

/**
 * Dependency Injection Container
 * Provides instances of infrastructure implementations and configured
 * domain services
 */
export class Container {
  private postRepository: PostRepository | null = null;
  private excerptService: ExcerptService | null = null;
  private postLinter: PostLinter | null = null;

  constructor(private readonly config: Env = env) {}

  getConfig(): Env {
    return this.config;
  }

  getPostRepository(): PostRepository {
    if (!this.postRepository) {
      this.postRepository =
        this.config.POST_SOURCE === "github"
          ? new GitHubPostRepository({
              ...getRepoInfo(this.config),
              root: this.config.POSTS_DIR,
              ref: this.config.GITHUB_REF,
              token: this.config.GITHUB_TOKEN,
            })
          : new FileSystemPostRepository(this.config.POSTS_DIR);
    }
    return this.postRepository;
  }

  getParser(): FrontMatterParser {
    return new FrontMatterParser();
  }

  getExcerptService(): ExcerptService {
    if (!this.excerptService) {
      this.excerptService = new ExcerptService(this.config.EXCERPT_SEPARATOR);
    }
    return this.excerptService;
  }

  getLinter(): PostLinter {
    if (!this.postLinter) {
      this.postLinter = new PostLinter(
        {
          requiredFields: getRequiredFields(this.config),
          disabledRules: this.config.LINT_DISABLED_RULES,
        },
        this.getExcerptService()
      );
    }
    return this.postLinter;
  }

  getPostService(): PostService {
    return new PostService(this.getLinter(), this.getExcerptService());
  }
}

// Singleton instance
export const container = new Container();
